import fs from 'fs';
import os from 'os';
import path from 'path';
import { runPipeline } from '../cli/generate';
import { writeArtifact } from '../diff-writer/writer';
import { latestModification, shouldRegenerate } from '../utils/freshness';
import { resolveConfig } from '../utils/config';
import { silentLogger } from '../utils/logger';
import { makePlugin } from './helpers';

const at = (iso: string) => new Date(iso);

describe('regeneration', () => {
  let tmp: string;

  const write = (rel: string, text: string) => {
    const file = path.join(tmp, rel);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, text, 'utf-8');
    return file;
  };

  const touch = (file: string, iso: string) => fs.utimesSync(file, at(iso), at(iso));

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'schema-compose-pipeline-'));
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  describe('shouldRegenerate', () => {
    it('should regenerate when the artifact is missing', () => {
      expect(shouldRegenerate(path.join(tmp, 'missing.ts'), [])).toBe(true);
    });

    it('should compare the newest plugin file with the artifact', () => {
      const artifact = write('entities.ts', '');
      touch(artifact, '2030-01-01T00:00:00Z');
      const older = makePlugin('core', [], [], { lastModified: at('2029-01-01T00:00:00Z').getTime() });
      const newer = makePlugin('blog', [], [], { lastModified: at('2031-01-01T00:00:00Z').getTime() });

      expect(shouldRegenerate(artifact, [older])).toBe(false);
      expect(shouldRegenerate(artifact, [older, newer])).toBe(true);
    });

    it('should take extra files into account', () => {
      const artifact = write('entities.ts', '');
      const config = write('compose.config.yaml', 'name: app\n');
      touch(artifact, '2030-01-01T00:00:00Z');
      touch(config, '2031-01-01T00:00:00Z');

      expect(shouldRegenerate(artifact, [], [config])).toBe(true);
      expect(latestModification([], [config, path.join(tmp, 'nope.yaml')])).toBe(at('2031-01-01T00:00:00Z').getTime());
    });
  });

  describe('writeArtifact', () => {
    it('should create parent folders and leave identical content alone', async () => {
      const file = path.join(tmp, 'generated', 'entities.ts');

      expect(await writeArtifact(file, 'export {};\n')).toBe('written');
      expect(fs.readFileSync(file, 'utf-8')).toBe('export {};\n');
      expect(await writeArtifact(file, 'export {};\n')).toBe('unchanged');
    });

    it('should touch a file whose content did not change', async () => {
      const file = write('generated/entities.ts', 'export {};\n');
      touch(file, '2030-01-01T00:00:00Z');

      expect(await writeArtifact(file, 'export {};\n', { touchTo: at('2031-01-01T00:00:00Z') })).toBe('unchanged');
      expect(fs.statSync(file).mtimeMs).toBe(at('2031-01-01T00:00:00Z').getTime());
    });

    it('should format the output with prettier when asked', async () => {
      const file = path.join(tmp, 'generated', 'entities.ts');

      expect(await writeArtifact(file, 'export const a = {b:1}', { prettier: true })).toBe('written');
      expect(fs.readFileSync(file, 'utf-8')).toBe('export const a = { b: 1 };\n');
    });

    it('should not touch the disk on a dry run', async () => {
      const file = path.join(tmp, 'generated', 'entities.ts');

      expect(await writeArtifact(file, 'export {};\n', { dryRun: true })).toBe('dry-run');
      expect(fs.existsSync(file)).toBe(false);
    });
  });

  describe('runPipeline', () => {
    const setup = () => {
      write('plugins/core/plugin.yaml', 'name: core\n');
      write('plugins/core/model.yaml', 'tables:\n  Tag:\n    columns:\n      - name: label\n        type: String\n');
      return resolveConfig({ output: 'out/entities.ts' }, path.join(tmp, 'compose.config.yaml'));
    };

    it('should generate, then skip while the output is fresh', async () => {
      const cfg = setup();

      const first = await runPipeline(cfg, { logger: silentLogger });

      expect(first.status).toBe('written');
      expect(first.schema?.tables.size).toBe(1);
      expect(fs.readFileSync(cfg.output, 'utf-8')).toContain('export class Tag extends BaseEntity {');

      touch(cfg.output, '2035-01-01T00:00:00Z');
      const second = await runPipeline(cfg, { logger: silentLogger });

      expect(second.status).toBe('up-to-date');
      expect(second.schema).toBeUndefined();
      expect(second.plugins.map(p => p.name)).toEqual(['core']);
    });

    it('should be up to date again after a plugin file is touched but not changed', async () => {
      const cfg = setup();
      await runPipeline(cfg, { logger: silentLogger });
      touch(cfg.output, '2030-01-01T00:00:00Z');
      touch(path.join(tmp, 'plugins/core/model.yaml'), '2031-01-01T00:00:00Z');

      expect((await runPipeline(cfg, { logger: silentLogger })).status).toBe('unchanged');
      expect((await runPipeline(cfg, { logger: silentLogger })).status).toBe('up-to-date');
    });

    it('should regenerate when forced or when a plugin changes', async () => {
      const cfg = setup();
      await runPipeline(cfg, { logger: silentLogger });
      touch(cfg.output, '2035-01-01T00:00:00Z');

      expect((await runPipeline(cfg, { force: true, logger: silentLogger })).status).toBe('unchanged');

      const model = write(
        'plugins/core/model.yaml',
        'tables:\n  Tag:\n    columns:\n      - name: label\n        type: Text\n'
      );
      touch(model, '2036-01-01T00:00:00Z');
      const result = await runPipeline(cfg, { logger: silentLogger });

      expect(result.status).toBe('written');
      expect(fs.readFileSync(cfg.output, 'utf-8')).toContain('  @Column({ type: "text" })\n  label!: string;');
    });
  });
});
