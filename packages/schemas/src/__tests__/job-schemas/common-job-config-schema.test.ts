import { describe, it, expect } from 'vitest';
import { CommonJobConfigSchema } from '../../index.js';

const validEnv = {
  SM_ACCESS_APIKEY: 'test-apikey',
  SM_INSTANCE_URL: 'https://instance.example.com',
  SM_SECRET_ID: 'secret-1',
  SM_SECRET_TASK_ID: 'task-0123456789',
  SM_SECRET_GROUP_ID: 'group-1',
  SM_SECRET_NAME: 'my-secret',
  SM_ACTION: 'create_credentials',
  SM_TRIGGER: 'manual',
};

describe('CommonJobConfigSchema', () => {
  it('should accept a complete environment', () => {
    const result = CommonJobConfigSchema.parse(validEnv);
    expect(result.SM_SECRET_NAME).toBe('my-secret');
    expect(result.SM_CREDENTIALS_ID).toBeUndefined();
  });

  it('should treat empty optional values as absent', () => {
    const result = CommonJobConfigSchema.parse({ ...validEnv, SM_CREDENTIALS_ID: '' });
    expect(result.SM_CREDENTIALS_ID).toBeUndefined();
  });

  it('should keep optional values when present', () => {
    const result = CommonJobConfigSchema.parse({ ...validEnv, SM_CREDENTIALS_ID: 'cred-9' });
    expect(result.SM_CREDENTIALS_ID).toBe('cred-9');
  });

  it('should reject a missing required value with its name', () => {
    const { SM_SECRET_ID: _omitted, ...rest } = validEnv;
    const result = CommonJobConfigSchema.safeParse(rest);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('SM_SECRET_ID is required');
    }
  });

  it('should reject a blank required value', () => {
    const result = CommonJobConfigSchema.safeParse({ ...validEnv, SM_SECRET_NAME: '   ' });
    expect(result.success).toBe(false);
  });

  it('should reject an instance URL that is not a URL', () => {
    const result = CommonJobConfigSchema.safeParse({ ...validEnv, SM_INSTANCE_URL: 'not a url' });
    expect(result.success).toBe(false);
  });
});
