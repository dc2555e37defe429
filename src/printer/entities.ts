import fs from 'fs';
import path from 'path';
import type {
   EntityDefinition,
   EntityMember,
   EntityModule,
   MixinDefinition,
} from '../generator/entities/types';
import { resolveStub, StubConfig } from '../utils/stubResolver';

/** Drivers whose connection string is a database file, not a URL. */
const FILE_DRIVERS = ['sqlite', 'better-sqlite3', 'sqljs'];

type EntityStubFn = (entity: EntityDefinition, decorators: string, body: string) => string;

type ModuleStubFn = (
   header: string,
   imports: string,
   mixins: string,
   entities: string,
   footer: string,
   sourceAdd: string
) => string;

/**
 * Escape a stub's contents so it can be wrapped in a JS template literal:
 * backslashes and backticks are taken literally, `${…}` stays live.
 */
export function formatStub(stub: string): string {
   return stub.replace(/\\/g, '\\\\').replace(/`/g, '\\`');
}

function indentBlock(text: string, indent = '  '): string {
   const normalized = text.replace(/\r\n/g, '\n');
   if (!normalized.trim()) return '';
   return normalized
      .split('\n')
      .map((line) => (line.length ? indent + line : line))
      .join('\n');
}

function propertyKey(name: string): string {
   return /^[A-Za-z_$][\w$]*$/.test(name) ? name : JSON.stringify(name);
}

/**
 * Prints entity definitions as one TypeScript module.
 *
 * Stubs are optional. `<stubDir>/module/index.stub` receives
 * `header, imports, mixins, entities, footer, sourceAdd`; an entity stub
 * (`<stubDir>/entity/<Name>.stub`, a group stub or `entity/index.stub`)
 * receives `entity, decorators, body`.
 */
export class EntityPrinter {
   // compiled template functions, by stub path
   private entityStubCache = new Map<string, EntityStubFn>();
   private moduleStubCache = new Map<string, ModuleStubFn>();

   constructor(private readonly stubConfig?: StubConfig) { }

   public print(module: EntityModule): string {
      const header = module.header.join('\n');
      const imports = this.renderImports(module);
      const mixins = this.renderMixins(module.mixins);
      const entities = module.entities.map((e) => this.renderEntity(e)).join('\n\n');
      const footer = this.renderFooter(module);
      const sourceAdd = module.sourceAdd.trim();

      const stubPath = resolveStub(this.stubConfig, 'module', 'index');
      if (stubPath) {
         const tmpl = this.loadModuleStub(stubPath);
         return tmpl(header, imports, mixins, entities, footer, sourceAdd).replace(/\r\n/g, '\n');
      }

      const parts = [header, imports, mixins, entities, footer, sourceAdd].filter((p) => p.trim());
      return parts.join('\n\n') + '\n';
   }

   // ---------------------------------------------------------------------------
   // IMPORTS
   // ---------------------------------------------------------------------------

   public renderImports(module: EntityModule): string {
      const structured = module.imports
         .filter((i) => i.types.length)
         .map((i) => `import { ${i.types.join(', ')} } from ${JSON.stringify(i.from)};`);

      // raw lines first, as written
      return Array.from(new Set([...module.rawImports, ...structured])).join('\n');
   }

   // ---------------------------------------------------------------------------
   // MEMBERS / MIXINS / ENTITIES
   // ---------------------------------------------------------------------------

   public renderMember(member: EntityMember): string {
      return [...member.decorators, `${propertyKey(member.name)}!: ${member.type};`].join('\n');
   }

   private renderBody(members: EntityMember[]): string {
      return indentBlock(members.map((m) => this.renderMember(m)).join('\n\n'));
   }

   private renderMixins(mixins: MixinDefinition[]): string {
      if (!mixins.length) return '';

      const chunks = [
         '// eslint-disable-next-line @typescript-eslint/no-explicit-any\n' +
         'type MixinBase = abstract new (...args: any[]) => object;',
      ];

      for (const mixin of mixins) {
         const body = this.renderBody(mixin.members);
         const cls = body
            ? `abstract class ${mixin.name} extends Base {\n${body}\n}`
            : `abstract class ${mixin.name} extends Base {}`;

         chunks.push(
            `export function ${mixin.name}Mixin<TBase extends MixinBase>(Base: TBase) {\n` +
            `${indentBlock(cls)}\n` +
            `  return ${mixin.name};\n` +
            `}`
         );
      }

      return chunks.join('\n\n');
   }

   public renderEntity(entity: EntityDefinition): string {
      const decorators = entity.decorators.join('\n');
      const body = this.renderBody([...entity.columns, ...entity.relations]);

      const stubPath = resolveStub(this.stubConfig, 'entity', entity.name);
      if (stubPath) {
         return this.loadEntityStub(stubPath)(entity, decorators, body).replace(/\r\n/g, '\n').trimEnd();
      }

      const open = `export class ${entity.name} extends ${entity.heritage} {`;
      return body ? `${decorators}\n${open}\n${body}\n}` : `${decorators}\n${open}}`;
   }

   // ---------------------------------------------------------------------------
   // ENTRY POINT
   // ---------------------------------------------------------------------------

   public renderFooter(module: EntityModule): string {
      const names = module.entities.map((e) => e.name).join(', ');
      const connection = FILE_DRIVERS.includes(module.engine) ? 'database: url' : 'url';

      return [
         `export const entities = [${names}];`,
         '',
         'export function initializeDatabase(url: string): Promise<DataSource> {',
         '  const dataSource = new DataSource({',
         `    type: ${JSON.stringify(module.engine)},`,
         `    ${connection},`,
         '    entities,',
         '    synchronize: true,',
         '  });',
         '  return dataSource.initialize();',
         '}',
      ].join('\n');
   }

   // ---------------------------------------------------------------------------
   // STUB HANDLING
   // ---------------------------------------------------------------------------

   private loadEntityStub(stubPath: string): EntityStubFn {
      let tmpl = this.entityStubCache.get(stubPath);
      if (!tmpl) {
         const raw = fs.readFileSync(path.resolve(stubPath), 'utf8').trim();
         tmpl = new Function(
            'entity',
            'decorators',
            'body',
            `return \`${formatStub(raw)}\`;`
         ) as EntityStubFn;
         this.entityStubCache.set(stubPath, tmpl);
      }
      return tmpl;
   }

   private loadModuleStub(stubPath: string): ModuleStubFn {
      let tmpl = this.moduleStubCache.get(stubPath);
      if (!tmpl) {
         const raw = fs.readFileSync(path.resolve(stubPath), 'utf8').trim();
         tmpl = new Function(
            'header',
            'imports',
            'mixins',
            'entities',
            'footer',
            'sourceAdd',
            `return \`${formatStub(raw)}\`;`
         ) as ModuleStubFn;
         this.moduleStubCache.set(stubPath, tmpl);
      }
      return tmpl;
   }
}
