import { describe, it, expect } from 'vitest';
import { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';
import { ErrorType, PipelineError, parseProviderError } from './errors.js';

function httpError(status: number): AxiosError {
  const config = { headers: new AxiosHeaders() };
  const response: AxiosResponse = { data: {}, status, statusText: '', headers: {}, config };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, undefined, response);
}

describe('parseProviderError', () => {
  it('should pass a PipelineError through', () => {
    const original = new PipelineError(ErrorType.MODEL_NOT_AVAILABLE, 'missing');
    expect(parseProviderError(original)).toBe(original);
  });

  it('should treat a missing response as a retryable network error', () => {
    const error = parseProviderError(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED'));

    expect(error.type).toBe(ErrorType.NETWORK_ERROR);
    expect(error.retryable).toBe(true);
  });

  it.each([
    [401, ErrorType.INVALID_API_KEY, false],
    [403, ErrorType.INVALID_API_KEY, false],
    [429, ErrorType.RATE_LIMITED, true],
    [503, ErrorType.API_ERROR, true],
    [400, ErrorType.API_ERROR, false]
  ])('should map status %i to %s', (status, type, retryable) => {
    const error = parseProviderError(httpError(status));

    expect(error.type).toBe(type);
    expect(error.retryable).toBe(retryable);
  });

  it('should wrap anything else as unknown', () => {
    const error = parseProviderError(new Error('odd'));

    expect(error.type).toBe(ErrorType.UNKNOWN_ERROR);
    expect(error.message).toBe('odd');
  });
});
