// generator/entities/types.ts
export interface TsImport {
   from: string;
   types: string[]; // e.g. ['Column', 'Entity']
}

/** One class member: decorator lines plus the property declaration. */
export interface EntityMember {
   name: string;
   decorators: string[];
   type: string;
}

export interface MixinDefinition {
   /** composite type name; the function is `<name>Mixin` */
   name: string;
   members: EntityMember[];
}

export interface EntityDefinition {
   name: string;
   tableName: string;
   /** `extends` clause, mixins applied around the base class */
   heritage: string;
   /** class decorators, `@Entity(...)` first */
   decorators: string[];
   columns: EntityMember[];
   relations: EntityMember[];
   /** owning plugins, contribution order */
   plugins: string[];
}

export interface EntityModule {
   header: string[];
   imports: TsImport[];
   /** import lines kept verbatim (side effects, default imports, …) */
   rawImports: string[];
   mixins: MixinDefinition[];
   entities: EntityDefinition[];
   engine: string;
   sourceAdd: string;
}
