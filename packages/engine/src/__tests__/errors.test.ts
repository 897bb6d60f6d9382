import { describe, it, expect } from 'vitest';

import {
  EngineClientError,
  EngineStartError,
  EngineTimeoutError,
  EngineClosedError,
  EngineProtocolError,
} from '../errors.js';

describe('Error Classes', () => {
  describe('EngineClientError', () => {
    it('should create error with message and details', () => {
      const error = new EngineClientError('Test error', 'Additional details');
      expect(error.message).toBe('Test error');
      expect(error.details).toBe('Additional details');
      expect(error.name).toBe('EngineClientError');
    });

    it('should be instanceof Error', () => {
      const error = new EngineClientError('Test');
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(EngineClientError);
    });
  });

  describe('EngineStartError', () => {
    it('should include the engine path and cause', () => {
      const error = new EngineStartError('/usr/games/stockfish', new Error('spawn ENOENT'));
      expect(error.message).toBe("Failed to start engine '/usr/games/stockfish': spawn ENOENT");
      expect(error.enginePath).toBe('/usr/games/stockfish');
      expect(error.details).toBe('spawn ENOENT');
      expect(error.name).toBe('EngineStartError');
      expect(error).toBeInstanceOf(EngineClientError);
    });

    it('should omit the cause when absent', () => {
      expect(new EngineStartError('sf').message).toBe("Failed to start engine 'sf'");
    });
  });

  describe('EngineTimeoutError', () => {
    it('should include operation and timeout in message', () => {
      const error = new EngineTimeoutError('analyse', 30000);
      expect(error.message).toBe("Operation 'analyse' timed out after 30000ms");
      expect(error.operation).toBe('analyse');
      expect(error.timeoutMs).toBe(30000);
      expect(error.name).toBe('EngineTimeoutError');
    });
  });

  describe('EngineClosedError', () => {
    it('should describe the reason when given', () => {
      expect(new EngineClosedError().message).toBe('Engine is not running');
      expect(new EngineClosedError('process exited with code 1').message).toBe(
        'Engine is not running: process exited with code 1',
      );
    });
  });

  describe('EngineProtocolError', () => {
    it('should create with message', () => {
      const error = new EngineProtocolError('Unexpected reply');
      expect(error.message).toBe('Unexpected reply');
      expect(error.name).toBe('EngineProtocolError');
    });
  });
});
