/**
 * Unit Tests: Sync CLI Arguments
 */
import { parseSyncArgs } from '../../scripts/syncArgs';
import { ValidationError } from '@shared/errors/AppError';

describe('parseSyncArgs', () => {
  it('should default to a daily run into the configured target', () => {
    expect(parseSyncArgs([], 'json')).toEqual({
      testMode: false,
      testModeLimitSessions: 200,
      loadTo: 'json',
    });
  });

  it('should read every flag', () => {
    const args = [
      '--test-mode',
      '--test-mode-limit-sessions',
      '25',
      '--start-dt',
      '2025-03-01',
      '--stop-dt',
      '2025-03-08',
      '--load-to',
      'v8',
    ];

    expect(parseSyncArgs(args, 'db')).toEqual({
      testMode: true,
      testModeLimitSessions: 25,
      startDt: '2025-03-01',
      stopDt: '2025-03-08',
      loadTo: 'v8',
    });
  });

  it('should not take the next flag as a value', () => {
    expect(parseSyncArgs(['--start-dt', '--test-mode'], 'db')).toEqual({
      testMode: true,
      testModeLimitSessions: 200,
      loadTo: 'db',
    });
  });

  it('should reject a date that is not on the calendar', () => {
    expect(() => parseSyncArgs(['--stop-dt', '2025-02-30'], 'db')).toThrow(
      new ValidationError('Invalid arguments: stopDt: expected a YYYY-MM-DD date'),
    );
  });

  it('should reject an unknown load target', () => {
    expect(() => parseSyncArgs(['--load-to', 'csv'], 'db')).toThrow(/^Invalid arguments: loadTo: /);
  });

  it('should reject a session cap below one', () => {
    expect(() => parseSyncArgs(['--test-mode-limit-sessions', '0'], 'db')).toThrow(ValidationError);
  });
});
