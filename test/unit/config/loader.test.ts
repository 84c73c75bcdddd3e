import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { DEFAULT_CONFIG, TOOLCHAIN_ENV_VAR, loadConfig } from '../../../src/config/loader.js';

describe('loadConfig', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cargo-mcp-config-'));
    configPath = path.join(dir, 'config.yaml');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes the default file on first run', async () => {
    const nested = path.join(dir, 'nested', 'config.yaml');
    const result = loadConfig(nested, {});
    expect(result).toEqual({ config: DEFAULT_CONFIG, configPath: nested, firstRun: true });
    const written = await fs.readFile(nested, 'utf-8');
    expect(written).toContain('timeout_seconds: 0');
  });

  it('reads back the generated defaults', () => {
    loadConfig(configPath, {});
    const again = loadConfig(configPath, {});
    expect(again.firstRun).toBe(false);
    expect(again.config).toEqual(DEFAULT_CONFIG);
  });

  it('merges a partial file over defaults', async () => {
    await fs.writeFile(configPath, 'execution:\n  timeout_seconds: 60\ntoolchain:\n  default: stable\n');
    expect(loadConfig(configPath, {}).config).toEqual({
      toolchain: { default: 'stable' },
      execution: { timeout_seconds: 60, max_output_bytes: 10 * 1024 * 1024, kill_grace_ms: 5000 },
    });
  });

  it('treats an empty file as all defaults', async () => {
    await fs.writeFile(configPath, '');
    expect(loadConfig(configPath, {})).toEqual({ config: DEFAULT_CONFIG, configPath, firstRun: false });
  });

  it('falls back to defaults on an unknown key', async () => {
    await fs.writeFile(configPath, 'execution:\n  timeout_seconds: 60\nextra: 1\n');
    expect(loadConfig(configPath, {}).config).toEqual(DEFAULT_CONFIG);
  });

  it('falls back to defaults on a value of the wrong type', async () => {
    await fs.writeFile(configPath, 'execution:\n  timeout_seconds: soon\n');
    expect(loadConfig(configPath, {}).config).toEqual(DEFAULT_CONFIG);
  });

  it('falls back to defaults on malformed YAML', async () => {
    await fs.writeFile(configPath, 'execution: [unclosed\n');
    expect(loadConfig(configPath, {}).config).toEqual(DEFAULT_CONFIG);
  });

  describe(TOOLCHAIN_ENV_VAR, () => {
    beforeEach(async () => {
      await fs.writeFile(configPath, 'toolchain:\n  default: stable\n');
    });

    it('overrides the file value', () => {
      expect(loadConfig(configPath, { [TOOLCHAIN_ENV_VAR]: 'nightly' }).config.toolchain.default).toBe('nightly');
    });

    it('is ignored when it is not a toolchain name', () => {
      expect(loadConfig(configPath, { [TOOLCHAIN_ENV_VAR]: '+nightly' }).config.toolchain.default).toBe('stable');
    });

    it('is ignored when empty', () => {
      expect(loadConfig(configPath, { [TOOLCHAIN_ENV_VAR]: '' }).config.toolchain.default).toBe('stable');
    });
  });

  it('returns a frozen configuration', async () => {
    await fs.writeFile(configPath, 'execution:\n  kill_grace_ms: 100\n');
    const { config } = loadConfig(configPath, {});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.execution)).toBe(true);
    expect(Object.isFrozen(config.toolchain)).toBe(true);
  });
});
