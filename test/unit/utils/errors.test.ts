import {
  FatalError,
  LookupError,
  ParseError,
  ResolutionError,
  errorMessage,
  isRetryableLookup,
} from '../../../src/utils/errors';

describe('errors', () => {
  it('names and codes each error type', () => {
    const cases = [
      [new ParseError('Empty line', 3, ''), 'ParseError', 'PARSE_ERROR'],
      [new ResolutionError('No match', 'no-match', 'foo'), 'ResolutionError', 'UNRESOLVED'],
      [new LookupError('HTTP 500', true, 'foo', 500), 'LookupError', 'LOOKUP_ERROR'],
      [new FatalError('Invalid platform: wii'), 'FatalError', 'FATAL_ERROR'],
    ] as const;

    for (const [error, name, code] of cases) {
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe(name);
      expect(error.code).toBe(code);
    }
  });

  it('keeps details and cause', () => {
    const cause = new Error('ENOENT');
    const error = new FatalError('Cannot read input file x.txt', { filePath: 'x.txt' }, { cause });

    expect(error.details).toEqual({ filePath: 'x.txt' });
    expect(error.cause).toBe(cause);
  });

  it('only treats retryable lookup errors as retryable', () => {
    expect(isRetryableLookup(new LookupError('HTTP 429', true))).toBe(true);
    expect(isRetryableLookup(new LookupError('HTTP 400', false))).toBe(false);
    expect(isRetryableLookup(new FatalError('nope'))).toBe(false);
    expect(isRetryableLookup('HTTP 429')).toBe(false);
  });

  it('extracts messages from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
