import type { PlainObject } from '../composer/document';
import { CircularBaseTypeError, DocumentParseError, DuplicateTypeError, UnknownBaseTypeError } from '../errors';
import {
  buildTypeCatalog,
  collectDeclaredTypes,
  declareType,
  isComposite,
  resolveCatalog,
  resolveType,
} from '../schema/type-catalog';
import { BUILTIN, COMPOSITE } from '../schema/types';
import { makePlugin } from './helpers';

function catalogOf(types: PlainObject) {
  return buildTypeCatalog([makePlugin('core', [{ types }])]);
}

describe('type catalog', () => {
  describe('built-ins', () => {
    it('should seed the built-in types', () => {
      const catalog = buildTypeCatalog([]);
      const dt = catalog.get('DateTime');

      expect(catalog.size).toBe(15);
      expect(dt?.plugin).toBe(BUILTIN);
      expect(dt?.nativeType).toBe('DateTime');
      expect(dt?.chain).toEqual([]);
      expect(dt?.language).toEqual({ tsType: 'Date', columnType: 'timestamp', tzColumnType: 'timestamptz' });
    });
  });

  describe('resolveType', () => {
    const declared = collectDeclaredTypes([
      makePlugin('core', [{ types: { Name: { base: 'String', nullable: false }, ShortName: { base: 'Name', length: 50 } } }]),
    ]);

    it('should walk the base chain nearest first', () => {
      const shortName = declared.get('ShortName');
      if (!shortName) throw new Error('ShortName missing');

      const resolved = resolveType(shortName, declared);

      expect(resolved.chain).toEqual(['Name', 'String']);
      expect(resolved.nativeType).toBe('String');
      expect(resolved.attributes).toEqual({ nullable: false, length: 50 });
      expect(resolved.language).toEqual({ tsType: 'string', columnType: 'varchar' });
    });

    it('should give the same result when resolving a resolved type', () => {
      const shortName = declared.get('ShortName');
      if (!shortName) throw new Error('ShortName missing');

      const once = resolveType(shortName, declared);
      const twice = resolveType(once, declared);

      expect(twice.chain).toEqual(once.chain);
      expect(twice.attributes).toEqual(once.attributes);
      expect(shortName.attributes).toEqual({ length: 50 });
    });

    it('should let own attributes win over inherited ones', () => {
      const catalog = catalogOf({
        Money: { base: 'Numeric', precision: 10, scale: 2 },
        Price: { base: 'Money', scale: 4 },
      });

      expect(catalog.get('Price')?.attributes).toEqual({ precision: 10, scale: 4 });
      expect(catalog.get('Price')?.nativeType).toBe('Numeric');
    });

    it('should accept a bare string as the base type and `inherits` as its alias', () => {
      const catalog = catalogOf({ Email: 'String', Slug: { inherits: 'String', unique: true } });

      expect(catalog.get('Email')?.chain).toEqual(['String']);
      expect(catalog.get('Slug')?.chain).toEqual(['String']);
      expect(catalog.get('Slug')?.attributes).toEqual({ unique: true });
    });

    it('should apply ts_type and ts_import over the built-in language', () => {
      const catalog = catalogOf({
        Settings: { base: 'JSON', ts_type: 'AppSettings', ts_import: "import type { AppSettings } from './settings';" },
      });

      expect(catalog.get('Settings')?.language).toEqual({
        tsType: 'AppSettings',
        columnType: 'json',
        import: "import type { AppSettings } from './settings';",
      });
      expect(catalog.get('Settings')?.attributes).toEqual({});
    });
  });

  describe('composite types', () => {
    it('should mark a column group without base as composite', () => {
      const catalog = catalogOf({
        Address: { columns: [{ name: 'street', type: 'String' }, { name: 'city', type: 'String' }] },
        Shipping: 'Address',
      });
      const address = catalog.get('Address');
      const shipping = catalog.get('Shipping');

      expect(address?.nativeType).toBe(COMPOSITE);
      expect(address && isComposite(address)).toBe(true);
      expect(shipping?.nativeType).toBe(COMPOSITE);
      expect(shipping?.embeddedColumns.map(c => c.attributes.name)).toEqual(['street', 'city']);
    });
  });

  describe('errors', () => {
    it('should reject a type declared by two plugins', () => {
      const plugins = [
        makePlugin('core', [{ types: { Email: 'String' } }]),
        makePlugin('other', [{ types: { Email: 'Text' } }], ['core']),
      ];

      let error: unknown;
      try {
        collectDeclaredTypes(plugins);
      } catch (e) {
        error = e;
      }

      expect(error).toBeInstanceOf(DuplicateTypeError);
      if (!(error instanceof DuplicateTypeError)) return;
      expect(error.owners).toEqual(['core', 'other']);
    });

    it('should reject a plugin type that shadows a built-in', () => {
      expect(() => catalogOf({ Integer: 'BigInteger' })).toThrow(
        'Type "Integer" declared in "core" is already defined by "<builtin>"'
      );
    });

    it('should merge one type spread over two documents of the same plugin', () => {
      const catalog = buildTypeCatalog([
        makePlugin('core', [{ types: { Name: { base: 'String' } } }, { types: { Name: { length: 80 } } }]),
      ]);

      expect(catalog.get('Name')?.attributes).toEqual({ length: 80 });
    });

    it('should merge the columns of a spread type by name', () => {
      const catalog = buildTypeCatalog([
        makePlugin('core', [
          { types: { Address: { columns: [{ name: 'street', type: 'String' }, { name: 'city', type: 'String' }] } } },
          { types: { Address: { columns: [{ name: 'city', length: 60 }, { name: 'zip', type: 'String' }] } } },
        ]),
      ]);

      expect(catalog.get('Address')?.embeddedColumns.map(c => c.attributes)).toEqual([
        { name: 'street', type: 'String' },
        { name: 'city', type: 'String', length: 60 },
        { name: 'zip', type: 'String' },
      ]);
    });

    it('should reject a types section that is not a mapping', () => {
      expect(() => buildTypeCatalog([makePlugin('core', [{ types: ['ID'] }])])).toThrow(DocumentParseError);
      expect(() => buildTypeCatalog([makePlugin('core', [{ types: ['ID'] }])])).toThrow(
        'Cannot parse types: `types` must be a mapping'
      );
    });

    it('should name the declaring plugin of an unknown base', () => {
      expect(() => catalogOf({ Foo: { base: 'Bar' } })).toThrow(UnknownBaseTypeError);
      expect(() => catalogOf({ Foo: { base: 'Bar' } })).toThrow(
        'Type "Foo" declared in "core" inherits unknown type "Bar"'
      );
    });

    it('should reject a type with neither base nor columns', () => {
      expect(() => catalogOf({ Empty: { nullable: true } })).toThrow(
        'Type "Empty" declared in "core" has neither a base type nor columns'
      );
    });

    it('should detect inheritance cycles', () => {
      const declared = collectDeclaredTypes([makePlugin('core', [{ types: { A: 'B', B: 'A' } }])]);

      let error: unknown;
      try {
        resolveCatalog(declared);
      } catch (e) {
        error = e;
      }

      expect(error).toBeInstanceOf(CircularBaseTypeError);
      if (!(error instanceof CircularBaseTypeError)) return;
      expect(error.chain).toEqual(['A', 'B', 'A']);
      expect(error.message).toBe('Type "A" inherits from itself: A → B → A');
    });
  });

  describe('declareType', () => {
    it('should strip structural keys from the attributes', () => {
      const type = declareType('ID', { base: 'Integer', primary_key: true, ts_type: 'number' }, 'core');

      expect(type.baseTypeName).toBe('Integer');
      expect(type.attributes).toEqual({ primary_key: true });
      expect(type.languageOverride).toEqual({ tsType: 'number' });
    });
  });
});
