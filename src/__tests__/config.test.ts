import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigError } from '../errors';
import { CONFIG_ENV, clearConfigCache, findConfigFile, loadConfig, resolveConfig } from '../utils/config';

describe('configuration', () => {
  let tmp: string;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'schema-compose-config-'));
    delete process.env[CONFIG_ENV];
  });

  afterEach(() => {
    clearConfigCache();
    delete process.env[CONFIG_ENV];
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  describe('resolveConfig', () => {
    it('should apply defaults and anchor paths at the config file', () => {
      const cfg = resolveConfig({}, '/srv/shop/compose.config.yaml');

      expect(cfg.name).toBe('app');
      expect(cfg.plugins).toEqual(['/srv/shop/plugins']);
      expect(cfg.output).toBe('/srv/shop/generated/entities.ts');
      expect(cfg.engine).toBe('postgres');
      expect(cfg.base_class).toBe('BaseEntity');
      expect(cfg.log_level).toBe('info');
      expect(cfg.strict_overrides).toBe(false);
      expect(cfg.prettier).toBe(false);
      expect(cfg.groups).toEqual([]);
      expect(cfg.source_imports).toEqual([]);
      expect(cfg.source_add).toBe('');
      expect(cfg.log_file).toBeUndefined();
      expect(cfg.rootDir).toBe('/srv/shop');
    });

    it('should accept single values where lists are expected', () => {
      const cfg = resolveConfig(
        { plugins: 'modules', version: 2, source_imports: 'import "reflect-metadata";', stub_dir: 'stubs' },
        '/srv/shop/compose.config.yaml'
      );

      expect(cfg.plugins).toEqual(['/srv/shop/modules']);
      expect(cfg.version).toBe('2');
      expect(cfg.source_imports).toEqual(['import "reflect-metadata";']);
      expect(cfg.stub_dir).toBe('/srv/shop/stubs');
    });

    it('should keep absolute paths', () => {
      const cfg = resolveConfig({ output: '/tmp/out/entities.ts' }, '/srv/shop/compose.config.yaml');

      expect(cfg.output).toBe('/tmp/out/entities.ts');
    });

    it('should list every invalid key', () => {
      let error: unknown;
      try {
        resolveConfig({ base_class: '1Base', log_level: 'verbose' }, '/srv/shop/compose.config.yaml');
      } catch (e) {
        error = e;
      }

      expect(error).toBeInstanceOf(ConfigError);
      if (!(error instanceof ConfigError)) return;
      expect(error.file).toBe('/srv/shop/compose.config.yaml');
      expect(error.issues).toHaveLength(2);
      expect(error.issues[0]).toBe('base_class: must be a valid identifier');
      expect(error.issues[1].startsWith('log_level: ')).toBe(true);
    });
  });

  describe('loadConfig', () => {
    it('should find compose.config.yaml in the working directory', async () => {
      fs.writeFileSync(path.join(tmp, 'compose.config.yaml'), 'name: shop\nplugins: [mods]\nstrict_overrides: true\n');

      const cfg = await loadConfig(undefined, tmp);

      expect(cfg.name).toBe('shop');
      expect(cfg.plugins).toEqual([path.join(tmp, 'mods')]);
      expect(cfg.strict_overrides).toBe(true);
      expect(cfg.configFile).toBe(path.join(tmp, 'compose.config.yaml'));
    });

    it('should read JSON and CommonJS configs', async () => {
      fs.writeFileSync(path.join(tmp, 'compose.config.json'), '{"name": "json-app"}');
      fs.writeFileSync(path.join(tmp, 'other.cjs'), 'module.exports = { name: "cjs-app", engine: "sqlite" };\n');

      const json = await loadConfig(undefined, tmp);
      const cjs = await loadConfig('other.cjs', tmp);

      expect(json.name).toBe('json-app');
      expect(cjs.name).toBe('cjs-app');
      expect(cjs.engine).toBe('sqlite');
    });

    it('should fail when the file does not exist', async () => {
      await expect(loadConfig('missing.yaml', tmp)).rejects.toThrow(ConfigError);
    });
  });

  describe('findConfigFile', () => {
    it('should prefer an explicit path, then the environment', () => {
      process.env[CONFIG_ENV] = 'env.yaml';

      expect(findConfigFile('cli.yaml', tmp)).toBe(path.join(tmp, 'cli.yaml'));
      expect(findConfigFile(undefined, tmp)).toBe(path.join(tmp, 'env.yaml'));
    });

    it('should fall back to the first candidate name', () => {
      expect(findConfigFile(undefined, tmp)).toBe(path.join(tmp, 'compose.config.yaml'));
    });
  });
});
