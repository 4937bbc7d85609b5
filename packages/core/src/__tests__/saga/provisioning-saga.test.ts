import { describe, it, expect, beforeEach } from 'vitest';
import { SagaState, TaskErrorCodes } from '@credential-providers/models';
import { ProvisioningSaga } from '../../saga/index.js';
import { ProviderError } from '../../errors/index.js';
import { FakeOrchestrator, createTestContext, createTestLogger } from '../../testing/index.js';
import { createMockBackend } from './test-utils.js';

describe('ProvisioningSaga', () => {
  let orchestrator: FakeOrchestrator;

  beforeEach(() => {
    orchestrator = new FakeOrchestrator();
  });

  function createSaga(validatePayload?: (payload: Record<string, unknown>) => string[]) {
    return new ProvisioningSaga({
      context: createTestContext(),
      orchestrator,
      logger: createTestLogger(),
      validatePayload,
    });
  }

  describe('create', () => {
    it('should report created credentials and succeed', async () => {
      const backend = createMockBackend();
      const saga = createSaga();

      const outcome = await saga.create(backend);

      expect(outcome).toEqual({
        status: 'succeeded',
        state: SagaState.ReportedOk,
        credentialId: 'cred-1',
      });
      expect(orchestrator.reports).toEqual([
        {
          method: 'reportCreated',
          taskId: 'task-abcdef123456',
          credential: { id: 'cred-1', payload: { token: 'test-token' } },
        },
      ]);
      expect(backend.revoke).not.toHaveBeenCalled();
      expect(saga.history).toEqual([SagaState.Start, SagaState.Created, SagaState.ReportedOk]);
    });

    it('should never revoke when create fails', async () => {
      const backend = createMockBackend();
      backend.create.mockRejectedValue(ProviderError.backendPermanent('mock: name taken', 409));
      const saga = createSaga();

      const outcome = await saga.create(backend);

      expect(backend.revoke).not.toHaveBeenCalled();
      expect(outcome).toEqual({
        status: 'failed',
        state: SagaState.ReportedError,
        code: TaskErrorCodes.CREATE_REJECTED,
        description: 'mock: name taken',
        reported: true,
      });
      expect(orchestrator.reports).toEqual([
        {
          method: 'reportFailed',
          taskId: 'task-abcdef123456',
          code: 'create_rejected',
          description: 'mock: name taken',
        },
      ]);
      expect(saga.history).toEqual([
        SagaState.Start,
        SagaState.CreateFailed,
        SagaState.ReportedError,
      ]);
    });

    it('should report an exhausted transient failure as backend unreachable', async () => {
      const backend = createMockBackend();
      backend.create.mockRejectedValue(ProviderError.backendTransient('mock: HTTP 503', 503));

      const outcome = await createSaga().create(backend);

      expect(outcome.status === 'failed' && outcome.code).toBe(TaskErrorCodes.BACKEND_UNREACHABLE);
    });

    it('should report a missing login secret with its own code', async () => {
      const backend = createMockBackend();
      backend.create.mockRejectedValue(ProviderError.upstreamFetch('secret login-1 missing'));

      const outcome = await createSaga().create(backend);

      expect(outcome.status === 'failed' && outcome.code).toBe(
        TaskErrorCodes.LOGIN_SECRET_UNAVAILABLE,
      );
      expect(backend.revoke).not.toHaveBeenCalled();
    });

    it('should revoke exactly once and report when the created report fails', async () => {
      const backend = createMockBackend({ id: 'key-77', payload: { token: 'test-token' } });
      orchestrator.reportCreatedError = ProviderError.report('HTTP 400: payload rejected', 400);
      const saga = createSaga();

      const outcome = await saga.create(backend);

      expect(backend.revoke).toHaveBeenCalledTimes(1);
      expect(backend.revoke).toHaveBeenCalledWith('key-77');
      expect(outcome).toEqual({
        status: 'failed',
        state: SagaState.ReportedError,
        code: TaskErrorCodes.REPORT_FAILED_AFTER_CREATE,
        description: 'HTTP 400: payload rejected; credentials key-77 were revoked',
        reported: true,
      });
      expect(orchestrator.reports.map((call) => call.method)).toEqual([
        'reportCreated',
        'reportFailed',
      ]);
      expect(saga.history).toEqual([
        SagaState.Start,
        SagaState.Created,
        SagaState.ReportFailed,
        SagaState.Compensated,
        SagaState.ReportedError,
      ]);
    });

    it('should end fatal without another report when compensation fails', async () => {
      const backend = createMockBackend();
      orchestrator.reportCreatedError = new Error('orchestrator unavailable');
      backend.revoke.mockRejectedValue(new Error('backend unavailable'));
      const saga = createSaga();

      const outcome = await saga.create(backend);

      expect(backend.revoke).toHaveBeenCalledTimes(1);
      expect(outcome).toEqual({
        status: 'failed',
        state: SagaState.Fatal,
        code: TaskErrorCodes.REVOKE_FAILED_AFTER_REPORT_FAILURE,
        description:
          'orchestrator unavailable; revoking credentials cred-1 also failed: backend unavailable',
        reported: false,
      });
      expect(orchestrator.reports.map((call) => call.method)).toEqual(['reportCreated']);
      expect(saga.history).toEqual([
        SagaState.Start,
        SagaState.Created,
        SagaState.ReportFailed,
        SagaState.CompensationFailed,
        SagaState.Fatal,
      ]);
    });

    it('should compensate an invalid payload without reporting it', async () => {
      const backend = createMockBackend();
      const saga = createSaga(() => ['token is required']);

      const outcome = await saga.create(backend);

      expect(backend.revoke).toHaveBeenCalledWith('cred-1');
      expect(outcome).toEqual({
        status: 'failed',
        state: SagaState.ReportedError,
        code: TaskErrorCodes.PAYLOAD_INVALID,
        description: 'credential payload is invalid: token is required; credentials cred-1 were revoked',
        reported: true,
      });
      expect(orchestrator.reports.map((call) => call.method)).toEqual(['reportFailed']);
    });

    it('should end fatal when the failure report itself fails', async () => {
      const backend = createMockBackend();
      backend.create.mockRejectedValue(new Error('boom'));
      orchestrator.reportFailedError = new Error('orchestrator unavailable');

      const outcome = await createSaga().create(backend);

      expect(outcome).toEqual({
        status: 'failed',
        state: SagaState.Fatal,
        code: TaskErrorCodes.CREATE_REJECTED,
        description: 'boom',
        reported: false,
      });
      expect(orchestrator.reports).toHaveLength(1);
    });

    it('should refuse to run twice', async () => {
      const saga = createSaga();
      await saga.create(createMockBackend());
      await expect(saga.create(createMockBackend())).rejects.toThrow(
        'saga already ran (state reported_ok)',
      );
    });
  });

  describe('delete', () => {
    it('should revoke then report the deletion', async () => {
      const backend = createMockBackend();

      const outcome = await createSaga().delete(backend, 'key-77');

      expect(backend.revoke).toHaveBeenCalledWith('key-77');
      expect(backend.create).not.toHaveBeenCalled();
      expect(outcome).toEqual({
        status: 'succeeded',
        state: SagaState.ReportedOk,
        credentialId: 'key-77',
      });
      expect(orchestrator.reports).toEqual([
        { method: 'reportDeleted', taskId: 'task-abcdef123456' },
      ]);
    });

    it('should report a failed revoke with the delete code', async () => {
      const backend = createMockBackend();
      backend.revoke.mockRejectedValue(ProviderError.backendPermanent('mock: HTTP 403', 403));

      const outcome = await createSaga().delete(backend, 'key-77');

      expect(outcome).toEqual({
        status: 'failed',
        state: SagaState.ReportedError,
        code: TaskErrorCodes.DELETE_REJECTED,
        description: 'mock: HTTP 403',
        reported: true,
      });
      expect(orchestrator.reports.map((call) => call.method)).toEqual(['reportFailed']);
    });

    it('should end fatal when the deletion cannot be reported', async () => {
      orchestrator.reportDeletedError = new Error('orchestrator unavailable');

      const outcome = await createSaga().delete(createMockBackend(), 'key-77');

      expect(outcome).toEqual({
        status: 'failed',
        state: SagaState.Fatal,
        code: TaskErrorCodes.ORCHESTRATOR_UNREACHABLE,
        description: 'orchestrator unavailable',
        reported: false,
      });
      expect(orchestrator.reports.map((call) => call.method)).toEqual(['reportDeleted']);
    });
  });

  describe('abort', () => {
    it('should report the failure without touching a backend', async () => {
      const saga = createSaga();

      const outcome = await saga.abort(TaskErrorCodes.UNKNOWN_ACTION, 'unknown action');

      expect(outcome.state).toBe(SagaState.ReportedError);
      expect(orchestrator.reports).toEqual([
        {
          method: 'reportFailed',
          taskId: 'task-abcdef123456',
          code: 'unknown_action',
          description: 'unknown action',
        },
      ]);
    });
  });
});
