import { describe, it, expect, beforeEach } from 'vitest';
import { SagaState, TaskErrorCodes } from '@credential-providers/models';
import { runJob } from '@credential-providers/core';
import {
  FakeOrchestrator,
  createTestEnvironment,
  createTestLogger,
} from '@credential-providers/core/testing';
import { createPostgresRoleJob } from '../job.js';
import type { PoolOptions } from '../database.js';
import { ADMIN_URL, CERTIFICATE_BASE64, CERTIFICATE_PEM, FakeDatabase } from './test-utils.js';

function loginSecret(certificateBase64 = CERTIFICATE_BASE64) {
  return {
    id: 'login-1',
    secret_type: 'service_credentials' as const,
    credentials: {
      connection: {
        postgres: {
          certificate: { certificate_base64: certificateBase64 },
          composed: [ADMIN_URL],
        },
      },
    },
  };
}

describe('postgresRoleJob', () => {
  let db: FakeDatabase;
  let poolOptions: PoolOptions[];
  let orchestrator: FakeOrchestrator;

  beforeEach(() => {
    db = new FakeDatabase();
    poolOptions = [];
    orchestrator = new FakeOrchestrator().withSecret(loginSecret());
  });

  function run(env: Record<string, string | undefined> = {}) {
    return runJob({
      job: createPostgresRoleJob((options) => {
        poolOptions.push(options);
        return db;
      }),
      env: createTestEnvironment({ SM_LOGIN_SECRET_ID_VALUE: 'login-1', ...env }),
      logger: createTestLogger(),
      orchestrator: () => orchestrator,
      retry: { sleep: async () => {} },
    });
  }

  it('should report the new role and close the pool', async () => {
    const outcome = await run({ SM_SCHEMA_NAME_VALUE: 'reporting' });

    expect(poolOptions).toEqual([{ composed: ADMIN_URL, caCertificate: CERTIFICATE_PEM }]);
    expect(outcome).toEqual({ status: 'succeeded', state: SagaState.ReportedOk, credentialId: '16384' });
    const [report] = orchestrator.reports;
    expect(report?.method).toBe('reportCreated');
    if (report?.method === 'reportCreated') {
      expect(report.credential.payload.username).toBe(db.roleNames()[0]);
      expect(report.credential.payload.certificate_base64).toBe(CERTIFICATE_BASE64);
    }
    expect(db.statements).toContain(
      `GRANT USAGE ON SCHEMA "reporting" TO "${db.roleNames()[0] ?? ''}"`,
    );
    expect(db.ended).toBe(true);
  });

  it('should drop the role when the report is rejected', async () => {
    orchestrator.reportCreatedError = new Error('HTTP 503');

    const outcome = await run();

    expect(outcome).toMatchObject({
      status: 'failed',
      state: SagaState.ReportedError,
      code: TaskErrorCodes.REPORT_FAILED_AFTER_CREATE,
    });
    expect(db.roles.size).toBe(0);
    expect(db.statements.filter((statement) => statement.startsWith('DROP ROLE'))).toHaveLength(1);
    expect(db.ended).toBe(true);
  });

  it('should report deletion of a role that is already gone', async () => {
    const outcome = await run({ SM_ACTION: 'delete_credentials', SM_CREDENTIALS_ID: '20000' });

    expect(outcome.status).toBe('succeeded');
    expect(orchestrator.reports).toEqual([{ method: 'reportDeleted', taskId: 'task-abcdef123456' }]);
  });

  it('should report a malformed credentials id as invalid configuration', async () => {
    const outcome = await run({ SM_ACTION: 'delete_credentials', SM_CREDENTIALS_ID: 'role-1' });

    expect(outcome).toMatchObject({ status: 'failed', code: TaskErrorCodes.CONFIGURATION_INVALID });
    expect(db.statements).toEqual([]);
  });

  it('should report a login secret without a PEM certificate', async () => {
    orchestrator.withSecret(loginSecret(Buffer.from('not a certificate').toString('base64')));

    const outcome = await run();

    expect(poolOptions).toEqual([]);
    expect(outcome).toMatchObject({
      status: 'failed',
      code: TaskErrorCodes.LOGIN_SECRET_UNAVAILABLE,
    });
  });

  it('should report a login secret of the wrong type', async () => {
    orchestrator.withSecret({ id: 'login-1', secret_type: 'arbitrary', payload: 'test-secret' });

    const outcome = await run();

    expect(outcome).toMatchObject({
      status: 'failed',
      code: TaskErrorCodes.LOGIN_SECRET_UNAVAILABLE,
    });
  });
});
