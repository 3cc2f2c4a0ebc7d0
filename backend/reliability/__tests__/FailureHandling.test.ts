import { telemetryStore } from '../../telemetry/TelemetryStore';
import { DomainError } from '../DomainError';
import { httpStatusFor, mapErrorToApiResponse } from '../FailureHandling';

describe('mapErrorToApiResponse', () => {
  let errorLog: jest.SpyInstance;

  beforeEach(() => {
    telemetryStore.reset();
    errorLog = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorLog.mockRestore();
  });

  test('maps inventory error codes to HTTP statuses', () => {
    expect(httpStatusFor('DUPLICATE_IDENTIFIER')).toBe(409);
    expect(httpStatusFor('NOT_FOUND')).toBe(404);
    expect(httpStatusFor('INVALID_ASSET_RECORD')).toBe(400);
    expect(httpStatusFor('TRAVERSAL_LIMIT_EXCEEDED')).toBe(422);
    expect(httpStatusFor('RULE_EVALUATION_ERROR')).toBe(500);
  });

  test('passes domain messages through with an error id', () => {
    const { status, body } = mapErrorToApiResponse(
      new DomainError({ code: 'NOT_FOUND', message: 'Asset not found: srv_9' }),
      { operation: 'inventory.asset' },
    );

    expect(status).toBe(404);
    expect(body.success).toBe(false);
    expect(body.errorMessage).toBe('Asset not found: srv_9');
    expect(body.error.code).toBe('NOT_FOUND');
    expect(body.error.errorId).toMatch(/^[0-9a-f-]{36}$/);

    const [event] = telemetryStore.eventsNamed('api.error');
    expect(event?.tags).toEqual({ operation: 'inventory.asset', code: 'NOT_FOUND', errorId: body.error.errorId });
    expect(errorLog).toHaveBeenCalledTimes(1);
  });

  test('masks unexpected errors', () => {
    const { status, body } = mapErrorToApiResponse(new TypeError('x is undefined'), { operation: 'inventory.views' });
    expect(status).toBe(500);
    expect(body.errorMessage).toBe('Unexpected error.');
    expect(body.error.code).toBe('UNKNOWN_ERROR');
  });
});
