#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'fs/promises';
import path from 'path';
import { existsSync } from 'fs';
import { stringify } from 'yaml';
import { toPlain } from '../composer/document';
import { formatHistory } from '../composer/merge-engine';
import { composeSchema } from '../schema';
import { loadConfig } from '../utils/config';
import { composeDocument, loadSortedPlugins, loggerFor, runPipeline } from './generate';

/** bundled default stubs (package root) */
const PKG_STUBS = path.resolve(__dirname, '../../stubs');

const cli = new Command();

cli
   .name('schema-compose')
   .description('Compose plugin schema declarations and generate TypeORM entities')
   .version('0.1.0');

//
// init
//
cli
   .command('init')
   .description('Scaffold compose.config.yaml and a first plugin')
   .option('-d, --dir <path>', 'Project directory', '.')
   .action(async (opts: { dir: string }) => {
      const root = path.resolve(process.cwd(), opts.dir);
      const cfgPath = path.join(root, 'compose.config.yaml');
      const pluginDir = path.join(root, 'plugins', 'core');

      if (existsSync(cfgPath)) {
         console.log(`🟡 Skip ${path.relative(process.cwd(), cfgPath)} (exists)`);
      } else {
         await fs.mkdir(root, { recursive: true });
         await fs.copyFile(path.join(PKG_STUBS, 'compose.config.yaml'), cfgPath);
         console.log('➡️  Created compose.config.yaml');
      }

      if (existsSync(pluginDir)) {
         console.log('🟡 Skip plugins/core (exists)');
      } else {
         await fs.mkdir(pluginDir, { recursive: true });
         await fs.copyFile(path.join(PKG_STUBS, 'plugin.yaml'), path.join(pluginDir, 'plugin.yaml'));
         await fs.copyFile(path.join(PKG_STUBS, 'model.yaml'), path.join(pluginDir, 'model.yaml'));
         console.log('➡️  Created plugins/core');
      }

      console.log('🎉 Initialization complete!');
   });

//
// customize
//
cli
   .command('customize')
   .alias('c')
   .description('Scaffold per-entity stub files from entity/index.stub')
   .option('--config <path>', 'Path to compose config file')
   .option(
      '-n, --names <list>',
      'Comma-separated entity names',
      (val: string) => val.split(',').map(s => s.trim()).filter(Boolean),
      []
   )
   .action(async (opts: { config?: string; names: string[] }) => {
      if (!opts.names.length) throw new Error('Specify at least one name with -n');

      const cfg = await loadConfig(opts.config);
      const stubRoot = cfg.stub_dir ?? path.join(cfg.rootDir, 'stubs');
      const dir = path.join(stubRoot, 'entity');

      const userIndex = path.join(dir, 'index.stub');
      const index = existsSync(userIndex) ? userIndex : path.join(PKG_STUBS, 'entity.stub');

      await fs.mkdir(dir, { recursive: true });
      for (const name of opts.names) {
         const dst = path.join(dir, `${name}.stub`);
         if (existsSync(dst)) {
            console.log(`🟡 Skip entity/${name}.stub`);
            continue;
         }
         await fs.copyFile(index, dst);
         console.log(`✅ Created entity/${name}.stub`);
      }

      console.log('🎉 Customize complete!');
   });

//
// gen
//
cli
   .command('gen')
   .description('Compose all plugins and (re)generate the entity module when stale')
   .option('--config <path>', 'Path to compose config file')
   .option('--force', 'Regenerate even when the output is up to date')
   .option('--dry-run', 'Compose and render, but do not write')
   .action(async (opts: { config?: string; force?: boolean; dryRun?: boolean }) => {
      const cfg = await loadConfig(opts.config);
      const result = await runPipeline(cfg, { force: opts.force, dryRun: opts.dryRun });
      if (result.status !== 'up-to-date') console.log('✅ Generation complete.');
   });

//
// check
//
cli
   .command('check')
   .description('Compose and resolve without writing anything')
   .option('--config <path>', 'Path to compose config file')
   .action(async (opts: { config?: string }) => {
      const cfg = await loadConfig(opts.config);
      const logger = loggerFor(cfg);
      const schema = composeSchema(loadSortedPlugins(cfg, logger), { logger, strictOverrides: cfg.strict_overrides });
      console.log(
         `✅ ${schema.plugins.length} plugins, ${schema.types.size} types, ${schema.tables.size} tables`
      );
   });

//
// plugins
//
cli
   .command('plugins')
   .description('List plugins in dependency order')
   .option('--config <path>', 'Path to compose config file')
   .action(async (opts: { config?: string }) => {
      const cfg = await loadConfig(opts.config);
      const plugins = loadSortedPlugins(cfg, loggerFor(cfg));

      console.log('\n📦 Plugins:');
      plugins.forEach((p, i) => {
         const deps = p.dependsOn.size ? `  (depends on: ${[...p.dependsOn].join(', ')})` : '';
         const modified = new Date(p.lastModified).toISOString();
         console.log(` ${i + 1}. ${p.name}@${p.version}${deps}  ${modified}  ${path.relative(process.cwd(), p.directory)}`);
      });
      console.log('');
   });

//
// history
//
cli
   .command('history')
   .description('Show which plugins contributed to each key')
   .option('--config <path>', 'Path to compose config file')
   .option('--filter <glob>', 'Only keys matching this glob, e.g. "tables.User.*"')
   .action(async (opts: { config?: string; filter?: string }) => {
      const cfg = await loadConfig(opts.config);
      const doc = composeDocument(cfg, loggerFor(cfg));
      formatHistory(doc.history, opts.filter).forEach(line => console.log(line));
   });

//
// dump
//
cli
   .command('dump')
   .description('Print the composed document')
   .option('--config <path>', 'Path to compose config file')
   .option('--provenance', 'Tag every mapping with the plugin that owns it (_plugin)')
   .option('--json', 'JSON instead of YAML')
   .action(async (opts: { config?: string; provenance?: boolean; json?: boolean }) => {
      const cfg = await loadConfig(opts.config);
      const doc = composeDocument(cfg, loggerFor(cfg));
      const plain = toPlain(doc.root, !!opts.provenance);
      console.log(opts.json ? JSON.stringify(plain, null, 2) : stringify(plain));
   });

cli.parseAsync(process.argv).catch((e: unknown) => {
   console.error(`❌ ${e instanceof Error ? e.message : String(e)}`);
   process.exit(1);
});
