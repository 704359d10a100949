import { describe, it, expect } from 'vitest';
import {
  AppError,
  ValidationError,
  AuthError,
  NotFoundError,
  ConflictError,
  BudgetExhaustedError,
  TransientProviderError,
  TimeoutError,
} from './errors';

describe('AppError', () => {
  it('sets statusCode, code, and message', () => {
    const err = new AppError(500, 'TEST_ERROR', 'something broke');
    expect(err.statusCode).toBe(500);
    expect(err.code).toBe('TEST_ERROR');
    expect(err.message).toBe('something broke');
    expect(err.name).toBe('AppError');
  });

  it('is an instance of Error', () => {
    const err = new AppError(500, 'TEST', 'msg');
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(AppError);
  });
});

describe('Error subclasses', () => {
  const cases: Array<{
    make: () => AppError;
    expectedStatus: number;
    expectedCode: string;
    expectedName: string;
  }> = [
    { make: () => new ValidationError('m'), expectedStatus: 400, expectedCode: 'VALIDATION_ERROR', expectedName: 'ValidationError' },
    { make: () => new AuthError('maps', 'm'), expectedStatus: 401, expectedCode: 'PROVIDER_AUTH_ERROR', expectedName: 'AuthError' },
    { make: () => new NotFoundError('m'), expectedStatus: 404, expectedCode: 'NOT_FOUND', expectedName: 'NotFoundError' },
    { make: () => new ConflictError('m'), expectedStatus: 409, expectedCode: 'CONFLICT', expectedName: 'ConflictError' },
    { make: () => new BudgetExhaustedError('m'), expectedStatus: 402, expectedCode: 'BUDGET_EXHAUSTED', expectedName: 'BudgetExhaustedError' },
    { make: () => new TransientProviderError('maps', 'm'), expectedStatus: 503, expectedCode: 'PROVIDER_UNAVAILABLE', expectedName: 'TransientProviderError' },
    { make: () => new TimeoutError(1000, 'm'), expectedStatus: 504, expectedCode: 'TIMEOUT', expectedName: 'TimeoutError' },
  ];

  cases.forEach(({ make, expectedStatus, expectedCode, expectedName }) => {
    describe(expectedName, () => {
      it(`has status ${expectedStatus} and code ${expectedCode}`, () => {
        const err = make();
        expect(err.statusCode).toBe(expectedStatus);
        expect(err.code).toBe(expectedCode);
        expect(err.message).toBe('m');
        expect(err.name).toBe(expectedName);
      });

      it('is an instance of AppError and Error', () => {
        const err = make();
        expect(err).toBeInstanceOf(AppError);
        expect(err).toBeInstanceOf(Error);
      });
    });
  });
});

describe('provider error fields', () => {
  it('AuthError carries the provider name', () => {
    expect(new AuthError('maps', 'bad key').provider).toBe('maps');
  });

  it('TransientProviderError defaults to retryable', () => {
    expect(new TransientProviderError('maps', 'HTTP 503').retryable).toBe(true);
    expect(new TransientProviderError('maps', 'gave up', false).retryable).toBe(false);
  });

  it('TimeoutError carries the elapsed budget', () => {
    expect(new TimeoutError(2500, 'slow').timeoutMs).toBe(2500);
  });
});
