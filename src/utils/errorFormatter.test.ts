import { TransportError } from '../gitlab/errors';
import { formatError, setDebugLogging } from './errorFormatter';

describe('formatError', () => {
  afterEach(() => {
    setDebugLogging(false);
  });

  it('prints only the message of an error', () => {
    expect(formatError(new Error('boom'))).toBe('boom');
  });

  it('prints a wrapped transport failure with its cause', () => {
    const error = TransportError.fromUnknown(new Error('socket hang up'), 'get', 'projects/1');

    expect(formatError(error)).toBe('GitLab API request failed [GET projects/1]: Unexpected error (socket hang up)');
  });

  it('prints the stack under --debug', () => {
    setDebugLogging(true);

    const formatted = formatError(new Error('with stack'));

    expect(formatted.startsWith('Error: with stack\n')).toBe(true);
    expect(formatted).toContain('    at ');
  });

  it('prints thrown strings as they are', () => {
    expect(formatError('plain error')).toBe('plain error');
  });

  it('prints other values as JSON', () => {
    expect(formatError({ code: 7 })).toBe('{"code":7}');
    expect(formatError(undefined)).toBe('undefined');
  });

  it('falls back to String for values JSON cannot hold', () => {
    expect(formatError(10n)).toBe('10');
  });
});
