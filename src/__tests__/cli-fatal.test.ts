import { describe, it, expect } from 'vitest';
import { reportFatal } from '../cli/fatal.js';
import { buildCli } from '../cli/commands.js';
import { DEFAULT_DOCS_URL } from '../config/env.js';
import { PreconditionViolation } from '../reconcile/errors.js';
import { Collector } from './helpers.js';

describe('reportFatal', () => {
  it('reports configuration errors with the status marker and troubleshooting link', () => {
    const stderr = new Collector();

    const status = reportFatal(new Error('Invalid namespace "Bad_NS".'), stderr, {
      MESHCTL_DOCS_URL: 'https://docs.example.test/mesh',
    });

    expect(status).toBe(1);
    expect(stderr.text).toBe(
      '× Invalid namespace "Bad_NS".\n' +
        'For troubleshooting help, visit: https://docs.example.test/mesh#troubleshooting\n'
    );
  });

  it('falls back to the default docs URL when the configured one is invalid', () => {
    const stderr = new Collector();

    reportFatal(new Error('Invalid MESHCTL_DOCS_URL: not a url'), stderr, { MESHCTL_DOCS_URL: 'not a url' });

    expect(stderr.text).toBe(
      '× Invalid MESHCTL_DOCS_URL: not a url\n' +
        `For troubleshooting help, visit: ${DEFAULT_DOCS_URL}#troubleshooting\n`
    );
  });

  it('keeps broken preconditions on their own exit status', () => {
    const stderr = new Collector();

    const status = reportFatal(new PreconditionViolation('ignore-cluster must be unset for upgrades'), stderr, {});

    expect(status).toBe(2);
    expect(stderr.text).toBe('meshctl: internal error: ignore-cluster must be unset for upgrades\n');
  });
});

describe('upgrade command', () => {
  it('rejects an invalid namespace before touching the cluster', async () => {
    await expect(
      buildCli().parseAsync(['upgrade', '--namespace', 'Bad_NS'], { from: 'user' })
    ).rejects.toThrow('Invalid namespace "Bad_NS"');
  });
});
