import { describe, it, expect } from 'vitest';
import {
  AppError,
  ValidationError,
  UnauthorizedError,
  ConfigError,
  ProviderError,
  NetworkError,
  ApiError,
  ParseError,
  isAppError,
  isChatError,
  describeError,
} from '../src/utils/errors.js';

describe('Error Classes', () => {
  describe('AppError', () => {
    it('should create error with all properties', () => {
      const error = new AppError('Test error', 400, 'TEST_ERROR', { field: 'value' });
      expect(error.message).toBe('Test error');
      expect(error.statusCode).toBe(400);
      expect(error.code).toBe('TEST_ERROR');
      expect(error.details).toEqual({ field: 'value' });
      expect(error.name).toBe('AppError');
    });

    it('should be instance of Error', () => {
      const error = new AppError('Test', 500, 'TEST');
      expect(error instanceof Error).toBe(true);
    });
  });

  describe('ValidationError', () => {
    it('should create error with details', () => {
      const details = { field: 'topic', issue: 'required' };
      const error = new ValidationError('Invalid input', details);
      expect(error.statusCode).toBe(400);
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.details).toEqual(details);
    });
  });

  describe('UnauthorizedError', () => {
    it('should create error with default message', () => {
      const error = new UnauthorizedError();
      expect(error.message).toBe('Unauthorized');
      expect(error.statusCode).toBe(401);
    });
  });

  describe('ConfigError', () => {
    it('should prefix the message', () => {
      const error = new ConfigError('OPENAI_API_KEY is required');
      expect(error.message).toBe('Configuration error: OPENAI_API_KEY is required');
      expect(error.statusCode).toBe(500);
      expect(error.code).toBe('CONFIG_ERROR');
      expect(error.name).toBe('ConfigError');
    });
  });

  describe('ProviderError', () => {
    it('should tag the message with the provider', () => {
      const error = new ProviderError('openai', 'Something failed');
      expect(error.message).toBe('openai: Something failed');
      expect(error.provider).toBe('openai');
      expect(error.statusCode).toBe(502);
      expect(error.code).toBe('PROVIDER_ERROR');
    });
  });

  describe('NetworkError', () => {
    it('should carry the cause text', () => {
      const error = new NetworkError('anthropic', 'fetch failed');
      expect(error.message).toBe('anthropic: Network error: fetch failed');
      expect(error.code).toBe('NETWORK_ERROR');
      expect(error.name).toBe('NetworkError');
      expect(error instanceof ProviderError).toBe(true);
    });
  });

  describe('ApiError', () => {
    it('should carry the upstream status code', () => {
      const error = new ApiError('openai', 429);
      expect(error.message).toBe('openai: API request failed: 429');
      expect(error.status).toBe(429);
      expect(error.statusCode).toBe(502);
      expect(error.code).toBe('API_ERROR');
      expect(error.details).toEqual({ status: 429 });
    });
  });

  describe('ParseError', () => {
    it('should keep the malformed fragment', () => {
      const error = new ParseError('openai', 'response body is not valid JSON', '<html>');
      expect(error.message).toBe('openai: Parse error: response body is not valid JSON');
      expect(error.code).toBe('PARSE_ERROR');
      expect(error.details).toEqual({ fragment: '<html>' });
    });

    it('should omit details without a fragment', () => {
      const error = new ParseError('anthropic', 'No text response from Claude');
      expect(error.details).toBeUndefined();
    });
  });

  describe('guards', () => {
    it('isAppError should identify app errors', () => {
      expect(isAppError(new ConfigError('x'))).toBe(true);
      expect(isAppError(new Error('x'))).toBe(false);
      expect(isAppError('x')).toBe(false);
    });

    it('isChatError should accept only provider failures', () => {
      expect(isChatError(new NetworkError('openai', 'x'))).toBe(true);
      expect(isChatError(new ApiError('openai', 500))).toBe(true);
      expect(isChatError(new ParseError('openai', 'x'))).toBe(true);
      expect(isChatError(new ConfigError('x'))).toBe(false);
      expect(isChatError(new ProviderError('openai', 'x'))).toBe(false);
    });

    it('describeError should handle non-Error values', () => {
      expect(describeError(new Error('boom'))).toBe('boom');
      expect(describeError(42)).toBe('42');
    });
  });
});
