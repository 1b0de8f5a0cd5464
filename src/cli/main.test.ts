import { afterEach, describe, expect, it, vi } from 'vitest';

async function runMain(argv: string[]) {
  const { main } = await import('./main');
  const out: string[] = [];
  const err: string[] = [];
  const code = await main(argv, { out: line => out.push(line), err: line => err.push(line) });
  return { code, out, err };
}

describe('main', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
    vi.restoreAllMocks();
  });

  it('reports invalid configuration instead of crashing', async () => {
    vi.stubEnv('LOG_LEVEL', 'loud');
    vi.resetModules();

    const { code, out, err } = await runMain(['--mood', 'calm']);
    expect(code).toBe(1);
    expect(out).toEqual([]);
    expect(err).toHaveLength(1);
    expect(err[0]?.startsWith('Invalid configuration: LOG_LEVEL: ')).toBe(true);
  });

  it('keeps --json output parseable with debug logging on', async () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.stubEnv('LOG_LEVEL', 'debug');
    vi.resetModules();

    const { code, out } = await runMain(['--trust', 'absent', '--mood', 'closed', '--json']);
    expect(code).toBe(0);
    expect(JSON.parse(out.join('\n')).context).toEqual([
      'mood:closed',
      'trust:absent',
      'trust:absent+mood:closed'
    ]);
    expect(stderr).toHaveBeenCalledWith('[Catalog]', expect.stringMatching(/^Loaded 19 suggestions \(catalog v1\)/));
  });
});
