import { describe, expect, it } from 'vitest';
import { applyServeFlags, parseArgs } from '../../cli/flags.js';
import { ConfigError } from '../../server/config.js';
import { testConfig } from '../helpers/fake-redmine.js';

describe('parseArgs', () => {
  it('separates positionals from flags', () => {
    expect(parseArgs(['cache', 'show', '--port', '9000', '--host=localhost', '--verbose'])).toEqual({
      positionals: ['cache', 'show'],
      flags: { port: '9000', host: 'localhost', verbose: 'true' },
    });
  });

  it('treats a flag followed by another flag as boolean', () => {
    expect(parseArgs(['--help', '--transport', 'http']).flags).toEqual({ help: 'true', transport: 'http' });
  });

  it('keeps everything after the first "="', () => {
    expect(parseArgs(['--host=a=b']).flags).toEqual({ host: 'a=b' });
  });
});

describe('applyServeFlags', () => {
  const base = testConfig('/tmp/cache');

  it('overrides the environment', () => {
    const next = applyServeFlags(base, { transport: 'http', host: 'localhost', port: '9100' });
    expect(next).toMatchObject({ transport: 'http', host: 'localhost', port: 9100 });
    expect(base.transport).toBe('stdio');
  });

  it('leaves the config alone without flags', () => {
    expect(applyServeFlags(base, {})).toEqual(base);
  });

  it('rejects bad values', () => {
    expect(() => applyServeFlags(base, { transport: 'sse' })).toThrow(new ConfigError('--transport must be "stdio" or "http", got "sse"'));
    expect(() => applyServeFlags(base, { port: 'true' })).toThrow('--port must be an integer between 1 and 65535, got "true"');
    expect(() => applyServeFlags(base, { port: '0' })).toThrow(ConfigError);
  });
});
