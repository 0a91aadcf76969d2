/**
 * Tests for error types
 */

import {
  ValidationError,
  SettingsValidationError,
  InitializationError,
  AcquisitionError
} from './errors';

describe('Error Types', () => {
  describe('ValidationError', () => {
    it('should create error with correct message', () => {
      const error = new ValidationError('Test error message');
      expect(error.message).toBe('Test error message');
    });

    it('should have correct name', () => {
      expect(new ValidationError('Test').name).toBe('ValidationError');
    });

    it('should be instance of Error', () => {
      expect(new ValidationError('Test')).toBeInstanceOf(Error);
    });
  });

  describe('SettingsValidationError', () => {
    it('should keep the ValidationError chain', () => {
      const error = new SettingsValidationError('x', []);
      expect(error).toBeInstanceOf(ValidationError);
      expect(error.name).toBe('SettingsValidationError');
    });

    it('should carry rejected fields on SettingsValidationError', () => {
      const error = new SettingsValidationError('bad', ['SAMPLE_INTERVAL_SEC']);
      expect(error.fields).toEqual(['SAMPLE_INTERVAL_SEC']);
    });
  });

  describe('InitializationError', () => {
    it('should not be a validation error', () => {
      const error = new InitializationError('no bus');
      expect(error).not.toBeInstanceOf(ValidationError);
      expect(error.name).toBe('InitializationError');
    });
  });

  describe('AcquisitionError', () => {
    it('should prefix the channel number', () => {
      const error = new AcquisitionError(2, 'timeout');
      expect(error.message).toBe('Channel 2: timeout');
      expect(error.channel).toBe(2);
      expect(error.name).toBe('AcquisitionError');
    });
  });
});
