import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigError, DEFAULT_CONFIG, loadConfig, parseServeFlags } from './config.ts';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sandboxd-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns the defaults when nothing is configured', () => {
    const config = loadConfig({ argv: [], env: {}, cwd: dir });

    assert.deepEqual(config, DEFAULT_CONFIG);
  });

  it('reads sandboxd.yaml from the working directory', () => {
    fs.writeFileSync(
      path.join(dir, 'sandboxd.yaml'),
      [
        'port: 8080',
        'max_sandboxes: 4',
        'shell: /bin/bash',
        'limits:',
        '  memory: 512m',
        '  cpus: 1.5',
        '  pids_limit: 128',
        '  network: none',
      ].join('\n'),
    );

    const config = loadConfig({ argv: [], env: {}, cwd: dir });

    assert.equal(config.port, 8080);
    assert.equal(config.maxSandboxes, 4);
    assert.equal(config.shell, '/bin/bash');
    assert.deepEqual(config.limits, { memory: '512m', cpus: 1.5, pidsLimit: 128, network: 'none' });
  });

  it('applies env over the file and flags over env', () => {
    fs.writeFileSync(path.join(dir, 'sandboxd.yaml'), 'port: 8080\nmax_sandboxes: 4\n');

    const config = loadConfig({
      argv: ['--max-sandboxes', '2'],
      env: { SANDBOXD_PORT: '9090', SANDBOXD_MAX_SANDBOXES: '6' },
      cwd: dir,
    });

    assert.equal(config.port, 9090);
    assert.equal(config.maxSandboxes, 2);
  });

  it('prefers SANDBOXD_PORT over PORT', () => {
    const both = loadConfig({ env: { SANDBOXD_PORT: '4000', PORT: '5000' }, cwd: dir });
    const plain = loadConfig({ env: { PORT: '5000' }, cwd: dir });

    assert.equal(both.port, 4000);
    assert.equal(plain.port, 5000);
  });

  it('reads --timeout in seconds', () => {
    const config = loadConfig({ argv: ['--timeout=90'], env: {}, cwd: dir });

    assert.equal(config.sandboxTimeoutMs, 90_000);
  });

  it('loads an explicit --config path', () => {
    fs.writeFileSync(path.join(dir, 'custom.yaml'), 'workdir: /srv\n');

    const config = loadConfig({ argv: ['-c', 'custom.yaml'], env: {}, cwd: dir });

    assert.equal(config.workdir, '/srv');
  });

  it('fails when an explicit config file is missing', () => {
    assert.throws(
      () => loadConfig({ env: { SANDBOXD_CONFIG: 'absent.yaml' }, cwd: dir }),
      { name: 'ConfigError', message: `config file ${path.join(dir, 'absent.yaml')} does not exist` },
    );
  });

  it('names the option and source of an invalid value', () => {
    fs.writeFileSync(path.join(dir, 'sandboxd.yaml'), 'max_sandboxes: 0\n');

    assert.throws(
      () => loadConfig({ env: {}, cwd: dir }),
      { message: `maxSandboxes from ${path.join(dir, 'sandboxd.yaml')} must be >= 1, got 0` },
    );
    assert.throws(
      () => loadConfig({ env: { SANDBOXD_EXEC_TIMEOUT_MS: 'soon' }, cwd: path.join(dir, 'nowhere') }),
      { message: 'execTimeoutMs from $SANDBOXD_EXEC_TIMEOUT_MS must be an integer, got "soon"' },
    );
    assert.throws(
      () => loadConfig({ argv: ['--port', '70000'], env: {}, cwd: path.join(dir, 'nowhere') }),
      { message: 'port from --port must be between 0 and 65535, got 70000' },
    );
  });

  it('rejects timeouts a timer cannot hold, after scaling seconds', () => {
    const nowhere = path.join(dir, 'nowhere');

    assert.throws(
      () => loadConfig({ argv: ['--timeout', '3000000'], env: {}, cwd: nowhere }),
      { message: 'sandboxTimeoutMs from --timeout must be between 0 and 2147483647, got 3000000000' },
    );
    assert.throws(
      () => loadConfig({ env: { SANDBOXD_EXEC_TIMEOUT_MS: '3000000000' }, cwd: nowhere }),
      { message: 'execTimeoutMs from $SANDBOXD_EXEC_TIMEOUT_MS must be between 1 and 2147483647, got 3000000000' },
    );
    assert.equal(loadConfig({ argv: ['--timeout', '2147483'], env: {}, cwd: nowhere }).sandboxTimeoutMs, 2_147_483_000);
  });

  it('rejects a file that is not a mapping', () => {
    fs.writeFileSync(path.join(dir, 'sandboxd.yaml'), '- port\n');

    assert.throws(() => loadConfig({ env: {}, cwd: dir }), ConfigError);
  });
});

describe('parseServeFlags', () => {
  it('rejects unknown flags and missing values', () => {
    assert.throws(() => parseServeFlags(['--verbose']), { message: 'unknown option --verbose' });
    assert.throws(() => parseServeFlags(['--port']), { message: '--port requires a value' });
  });

  it('accepts short aliases', () => {
    const parsed = parseServeFlags(['-p', '1234', '-m', '3']);

    assert.deepEqual([...parsed.values.values()], ['1234', '3']);
    assert.equal(parsed.configPath, undefined);
  });
});
