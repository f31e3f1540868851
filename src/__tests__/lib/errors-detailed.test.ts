import { expect, it } from 'vitest';

import {
  createDetailedError,
  ErrorCode,
  formatDetailedError,
  getSuggestion,
  LineFindError,
} from '../../lib/errors.js';

it('createDetailedError creates detailed error object', () => {
  const error = new LineFindError(
    ErrorCode.E_NOT_FOUND,
    'File not found: /some/path',
    '/some/path'
  );
  const detailed = createDetailedError(error);

  expect(detailed).toEqual({
    code: ErrorCode.E_NOT_FOUND,
    message: 'File not found: /some/path',
    path: '/some/path',
    suggestion: getSuggestion(ErrorCode.E_NOT_FOUND),
    details: undefined,
  });
});

it('createDetailedError includes additional details', () => {
  const error = new Error('Error');
  const detailed = createDetailedError(error, '/path', { extra: 'info' });
  expect(detailed.details).toEqual({ extra: 'info' });
  expect(detailed.code).toBe(ErrorCode.E_UNKNOWN);
});

it('formatDetailedError formats error for display', () => {
  const formatted = formatDetailedError({
    code: ErrorCode.E_NOT_FOUND,
    message: 'File not found: /some/path',
    path: '/some/path',
    suggestion: 'Check the path exists',
  });

  expect(formatted).toBe(
    [
      'linefind: File not found: /some/path [E_NOT_FOUND]',
      '  path: /some/path',
      '  hint: Check the path exists',
    ].join('\n')
  );
});

it('formatDetailedError handles missing optional fields', () => {
  const formatted = formatDetailedError({
    code: ErrorCode.E_UNKNOWN,
    message: 'Unknown error',
  });

  expect(formatted).toBe('linefind: Unknown error [E_UNKNOWN]');
});
