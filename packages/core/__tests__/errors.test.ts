import { describe, expect, it } from 'vitest'

import { formatChangeError, type ChangeError } from '../src/errors.js'
import { describeMutation } from '../src/mutation.js'
import { pluginPackage } from './helpers.js'

const cases: Array<[ChangeError, string]> = [
  [
    { code: 'DuplicateId', id: 'stats' },
    'Plugin stats is already installed. Use `plugins upgrade` to replace it.',
  ],
  [
    { code: 'CyclicDependency', chain: ['a', 'b', 'a'] },
    'Dependency cycle: a -> b -> a',
  ],
  [
    { code: 'HasDependents', dependents: ['addon', 'extra'] },
    'Enabled plugins depend on it: addon, extra. Disable them first.',
  ],
  [
    {
      code: 'VersionMismatch',
      id: 'base',
      required: '1.2.0',
      found: '1.1.0',
      requiredBy: 'addon',
    },
    'addon requires base 1.2.0 (same major), found 1.1.0',
  ],
  [
    { code: 'FileCollision', path: '/srv/plugins/stats', owner: null },
    'Plugin files would overwrite /srv/plugins/stats, which no installed plugin owns. Remove it and retry.',
  ],
  [
    {
      code: 'HealthCheckFailed',
      attempts: 3,
      rollbackRestarted: true,
      lastError: 'HTTP 503',
    },
    'Scoreboard did not become healthy after 3 check(s) (last: HTTP 503); rolled back and restarted',
  ],
  [
    { code: 'RestartFailed', cause: 'Timeout', message: 'no answer', rollbackRestarted: false },
    'Restart failed (Timeout): no answer. The previous configuration is still in place.',
  ],
  [
    { code: 'RestartFailed', cause: 'Fault', message: 'spawn error', rollbackRestarted: true },
    'Restart failed (Fault): spawn error; rolled back and restarted on the previous configuration',
  ],
  [
    { code: 'TransactionBusy', holder: null },
    'Another change is in progress. Retry when it has finished.',
  ],
]

describe('formatChangeError', () => {
  it.each(cases)('formats %o', (error, expected) => {
    expect(formatChangeError(error)).toBe(expected)
  })

  it('lists every invalid field', () => {
    expect(
      formatChangeError({
        code: 'ValidationError',
        field: 'a',
        reason: 'expected a string',
        issues: [
          { field: 'a', reason: 'expected a string' },
          { field: 'b', reason: 'must be >= 1' },
        ],
      })
    ).toBe('Invalid configuration: a: expected a string; b: must be >= 1')
  })
})

describe('describeMutation', () => {
  it('names the keys of a config change', () => {
    expect(
      describeMutation({ kind: 'set-config', values: { 'a.b': 1, c: true }, unset: ['d'] })
    ).toBe('set-config a.b, c, d')
  })

  it('names the package of an install', () => {
    expect(
      describeMutation({ kind: 'install-plugin', package: pluginPackage('stats', { version: '2.0.1' }) })
    ).toBe('install-plugin stats@2.0.1')
  })
})
