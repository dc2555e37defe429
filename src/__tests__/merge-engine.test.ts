import { toPlain } from '../composer/document';
import { MergeEngine, formatHistory } from '../composer/merge-engine';
import { ScalarOverrideError, TypeConflictError } from '../errors';
import type { Logger } from '../utils/logger';
import { makePlugin } from './helpers';

function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    debug: () => undefined,
    info: () => undefined,
    warn: (m: string) => {
      warnings.push(m);
    },
    error: () => undefined,
  };
}

const core = makePlugin('core', [
  {
    tables: {
      User: {
        columns: [
          { name: 'id', type: 'Integer', primary_key: true },
          { name: 'email', type: 'String' },
        ],
      },
    },
  },
]);

const audit = makePlugin(
  'audit',
  [
    {
      tables: {
        User: {
          columns: [
            { name: 'email', unique: true },
            { name: 'created_at', type: 'DateTime' },
          ],
        },
      },
    },
  ],
  ['core']
);

describe('MergeEngine', () => {
  describe('column lists', () => {
    it('should merge columns by name and append new ones', () => {
      const doc = new MergeEngine().compose([core, audit]);

      expect(toPlain(doc.root)).toEqual({
        tables: {
          User: {
            columns: [
              { name: 'id', type: 'Integer', primary_key: true },
              { name: 'email', type: 'String', unique: true },
              { name: 'created_at', type: 'DateTime' },
            ],
          },
        },
      });
    });

    it('should hand a merged column to the plugin that merged into it', () => {
      const doc = new MergeEngine().compose([core, audit]);
      const plain = toPlain(doc.root, true);

      expect(plain).toEqual({
        _plugin: 'core',
        tables: {
          _plugin: 'core',
          User: {
            _plugin: 'core',
            columns: [
              { _plugin: 'core', name: 'id', type: 'Integer', primary_key: true },
              { _plugin: 'audit', name: 'email', type: 'String', unique: true },
              { _plugin: 'audit', name: 'created_at', type: 'DateTime' },
            ],
          },
        },
      });
    });

    it('should use an exact handler before a pattern', () => {
      const engine = new MergeEngine();
      engine.registerMergeHandler('tables.User.columns', (_existing, incoming) => incoming);

      const doc = engine.compose([core, audit]);

      expect(toPlain(doc.root)).toEqual({
        tables: {
          User: {
            columns: [
              { name: 'email', unique: true },
              { name: 'created_at', type: 'DateTime' },
            ],
          },
        },
      });
    });
  });

  describe('history', () => {
    it('should record every plugin that touched a key', () => {
      const doc = new MergeEngine().compose([core, audit]);

      expect(doc.history.get('tables.User')).toEqual(['core', 'audit']);
      expect(doc.history.get('tables.User.columns')).toEqual(['core', 'audit']);
      expect(doc.history.get('tables.User.columns.email')).toEqual(['core', 'audit']);
      expect(doc.order).toEqual(['core', 'audit']);
    });

    it('should record every key of a subtree a plugin adds', () => {
      const doc = new MergeEngine().compose([core, audit]);

      expect(doc.history.get('tables')).toEqual(['core', 'audit']);
      expect(doc.history.get('tables.User.columns.id')).toEqual(['core']);
      expect(doc.history.get('tables.User.columns.id.primary_key')).toEqual(['core']);
      expect(doc.history.get('tables.User.columns.created_at')).toEqual(['audit']);
      expect(doc.history.get('tables.User.columns.created_at.type')).toEqual(['audit']);
    });

    it('should record a table declared by one plugin only', () => {
      const engine = new MergeEngine();
      engine.merge({ tables: { Tag: { name: 'tags' } } }, 'core');

      expect(engine.history().get('tables.Tag')).toEqual(['core']);
      expect(engine.history().get('tables.Tag.name')).toEqual(['core']);
    });

    it('should format and filter the history', () => {
      const doc = new MergeEngine().compose([core, audit]);

      expect(formatHistory(doc.history, 'tables.User.columns.email*')).toEqual([
        'tables.User.columns.email: defined in [core, audit]',
        'tables.User.columns.email.name: defined in [core, audit]',
        'tables.User.columns.email.type: defined in [core]',
        'tables.User.columns.email.unique: defined in [audit]',
      ]);
    });
  });

  describe('scalars', () => {
    it('should let the later plugin win and warn about it', () => {
      const logger = recordingLogger();
      const engine = new MergeEngine({ logger });
      engine.merge({ settings: { engine: 'postgres' } }, 'core');
      engine.merge({ settings: { engine: 'mysql' } }, 'other');

      expect(toPlain(engine.document().root)).toEqual({ settings: { engine: 'mysql' } });
      expect(logger.warnings).toEqual([
        `[other] Overlapping value for key 'settings.engine': "postgres" -> "mysql" (was core)`,
      ]);
    });

    it('should not warn when the value is unchanged', () => {
      const logger = recordingLogger();
      const engine = new MergeEngine({ logger });
      engine.merge({ settings: { engine: 'postgres' } }, 'core');
      engine.merge({ settings: { engine: 'postgres' } }, 'other');

      expect(logger.warnings).toHaveLength(0);
    });

    it('should throw on an override in strict mode', () => {
      const engine = new MergeEngine({ strictOverrides: true });
      engine.merge({ settings: { engine: 'postgres' } }, 'core');

      expect(() => engine.merge({ settings: { engine: 'mysql' } }, 'other')).toThrow(ScalarOverrideError);
      expect(() => engine.merge({ settings: { engine: 'mysql' } }, 'other')).toThrow(
        `[other] overrides 'settings.engine': "postgres" -> "mysql"`
      );
    });
  });

  describe('lists', () => {
    it('should extend plain lists without repeating equal items', () => {
      const engine = new MergeEngine();
      engine.merge({ tags: ['a', 'b'] }, 'core');
      engine.merge({ tags: ['b', 'c'] }, 'other');

      expect(toPlain(engine.document().root)).toEqual({ tags: ['a', 'b', 'c'] });
    });
  });

  describe('conflicts', () => {
    it('should reject values of different shapes', () => {
      const engine = new MergeEngine();
      engine.merge({ tables: { User: { columns: [] } } }, 'core');

      let error: unknown;
      try {
        engine.merge({ tables: { User: { columns: 'id' } } }, 'other');
      } catch (e) {
        error = e;
      }

      expect(error).toBeInstanceOf(TypeConflictError);
      if (!(error instanceof TypeConflictError)) return;
      expect(error.path).toBe('tables.User.columns');
      expect(error.existing).toEqual({ plugin: 'core', shape: 'list' });
      expect(error.incoming).toEqual({ plugin: 'other', shape: 'scalar(string)' });
    });
  });
});
