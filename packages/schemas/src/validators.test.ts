import { describe, it, expect } from 'vitest';
import { validateBridgeConfig, validateServiceAccountKey } from './validators.js';
import { SchemaValidationError } from '@verity/shared/src/utils/errors.js';

describe('validateBridgeConfig', () => {
  it('should accept a minimal configuration', () => {
    const result = validateBridgeConfig({ tokenRefreshIntervalSeconds: 2900 });
    expect(result.tokenRefreshIntervalSeconds).toBe(2900);
    expect(result.httpTimeoutSeconds).toBe(300);
  });

  it('should reject an empty scope list', () => {
    expect(() =>
      validateBridgeConfig({ tokenRefreshIntervalSeconds: 2900, scopes: [] }),
    ).toThrow(SchemaValidationError);
  });

  it('should accept the longest refresh interval a timer can hold', () => {
    const result = validateBridgeConfig({ tokenRefreshIntervalSeconds: 2_147_483 });
    expect(result.tokenRefreshIntervalSeconds).toBe(2_147_483);
  });

  it('should reject a refresh interval longer than a timer can hold', () => {
    expect(() => validateBridgeConfig({ tokenRefreshIntervalSeconds: 2_200_000 })).toThrow(
      SchemaValidationError,
    );
  });

  it('should include validation error details', () => {
    try {
      validateBridgeConfig({ tokenRefreshIntervalSeconds: -5 });
      expect.fail('Should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaValidationError);
      expect((error as SchemaValidationError).validationErrors).toHaveLength(1);
      expect((error as SchemaValidationError).validationErrors[0]).toMatch(
        /^tokenRefreshIntervalSeconds: /,
      );
    }
  });
});

describe('validateServiceAccountKey', () => {
  const validKey = {
    type: 'service_account',
    private_key: 'test-private-key',
    client_email: 'bridge@test-project.iam.gserviceaccount.com',
  };

  it('should accept a key and keep unknown fields', () => {
    const result = validateServiceAccountKey({ ...validKey, universe_domain: 'googleapis.com' });
    expect(result.client_email).toBe(validKey.client_email);
    expect(result['universe_domain']).toBe('googleapis.com');
  });

  it('should reject a key of another credential type', () => {
    expect(() => validateServiceAccountKey({ ...validKey, type: 'authorized_user' })).toThrow(
      SchemaValidationError,
    );
  });

  it('should reject a malformed client email', () => {
    expect(() => validateServiceAccountKey({ ...validKey, client_email: 'nope' })).toThrow(
      SchemaValidationError,
    );
  });
});
