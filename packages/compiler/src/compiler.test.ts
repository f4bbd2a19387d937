/**
 * SchemaCompiler Tests
 */
import { describe, it, expect } from 'vitest';
import { ParentSchemaNotFoundError, ParseError, UnsupportedTypeError, type GeneratedFile } from '@polyschema/shared';
import { SchemaCompiler, type SchemaSource } from './compiler.js';
import { stripTimestamp } from './generation/header.js';
import { ACCOUNT_YAML, GENERATED_AT, LISTING_YAML, VENUE_YAML } from './__tests__/fixtures.js';

const BROKEN_YAML = 'schema:\n  name: Broken\n';

const TAGGED_YAML = `
schema:
  name: Tagged
  description: Schema with an unannotated list
fields:
  - name: cats
    type: list[string]
    description: Category labels
`;

const SOURCES: SchemaSource[] = [
  { path: 'schemas/listing.yaml', content: LISTING_YAML },
  { path: 'schemas/venue.yaml', content: VENUE_YAML },
];

function contentOf(files: readonly GeneratedFile[], path: string): string {
  const file = files.find((candidate) => candidate.path === path);
  if (!file) {
    throw new Error(`No generated file named ${path}`);
  }
  return file.content;
}

describe('SchemaCompiler', () => {
  const compiler = new SchemaCompiler({ generatedAt: GENERATED_AT });

  describe('compile', () => {
    it('should emit files in target order, then schema order', () => {
      const { files } = compiler.compile(SOURCES);

      expect(files.map((file) => file.path)).toEqual([
        'listing.ts',
        'venue.ts',
        'schema.prisma',
        'listing.types.ts',
        'venue.types.ts',
        'listing.extraction.ts',
        'venue.extraction.ts',
      ]);
      expect(files.map((file) => file.target)).toEqual([
        'record',
        'record',
        'storage',
        'interface',
        'interface',
        'extraction',
        'extraction',
      ]);
    });

    it('should record which sources produced each file', () => {
      const { files } = compiler.compile(SOURCES);

      expect(files[1]?.sources).toEqual(['schemas/venue.yaml']);
      expect(files[2]?.sources).toEqual(['schemas/listing.yaml', 'schemas/venue.yaml']);
    });

    it('should stamp every file with the same generation time', () => {
      const { files } = compiler.compile(SOURCES);

      for (const file of files) {
        expect(file.content).toContain('// Generated at: 2026-01-15T09:30:00.000Z\n');
      }
    });

    it('should agree on nullability across every target', () => {
      const { files } = compiler.compile(SOURCES);
      const record = contentOf(files, 'listing.ts');
      const storage = contentOf(files, 'schema.prisma');
      const types = contentOf(files, 'listing.types.ts');
      const extraction = contentOf(files, 'listing.extraction.ts');

      expect(record).toContain(`    name: 'phone',\n    typeAnnotation: 'string | null',`);
      expect(storage).toContain('\n  phone         String?\n');
      expect(types).toContain('  phone: string | null;');
      expect(types).toContain('  phone: z.string().nullable(),');
      expect(extraction).toContain('  phone: z.string().nullable().optional()');

      expect(record).toContain(`    name: 'entity_name',\n    typeAnnotation: 'string',`);
      expect(storage).toContain('\n  entity_name   String\n');
      expect(types).toContain('  entity_name: string;');
      expect(types).toContain('  entity_name: z.string(),');
      expect(extraction).toContain('  entity_name: z.string().optional()');
    });

    it('should leave Zod out of interfaces when validation is off', () => {
      const { files } = new SchemaCompiler({ includeValidation: false, generatedAt: GENERATED_AT }).compile(SOURCES, [
        'interface',
      ]);

      expect(files.map((file) => file.path)).toEqual(['listing.types.ts', 'venue.types.ts']);
      expect(contentOf(files, 'listing.types.ts')).not.toContain('ListingSchema');
    });

    it('should limit per-schema targets to the selected schemas', () => {
      const { files } = compiler.compile(SOURCES, ['record', 'storage'], { schemas: ['Venue'] });

      expect(files.map((file) => file.path)).toEqual(['venue.ts', 'schema.prisma']);
      expect(contentOf(files, 'schema.prisma')).toContain('model Listing {');
    });

    it('should reject unknown schema names in the selection', () => {
      expect(() => compiler.compile(SOURCES, ['record'], { schemas: ['Venue', 'Ghost'] })).toThrow(
        'Unknown schema(s): Ghost'
      );
    });

    it('should surface dialect limits as type errors', () => {
      const sqlite = new SchemaCompiler({ dialect: 'sqlite', generatedAt: GENERATED_AT });

      const rejected = sqlite.compile(SOURCES, ['storage']);
      expect(rejected.files).toEqual([]);
      expect(rejected.errors).toHaveLength(1);
      expect(rejected.errors[0]).toBeInstanceOf(UnsupportedTypeError);

      const accepted = sqlite.compile([{ path: 'schemas/account.yaml', content: ACCOUNT_YAML }], ['storage']);
      expect(accepted.files).toHaveLength(1);
      expect(accepted.errors).toEqual([]);
    });

    it('should report no errors when every invocation succeeds', () => {
      expect(compiler.compile(SOURCES).errors).toEqual([]);
    });
  });

  describe('determinism', () => {
    it.each(['record', 'storage', 'interface', 'extraction'] as const)(
      'should regenerate %s output identically apart from the timestamp',
      (target) => {
        const first = new SchemaCompiler({ generatedAt: GENERATED_AT }).compile(SOURCES, [target]).files;
        const second = new SchemaCompiler({ generatedAt: new Date('2026-03-02T18:00:00.000Z') }).compile(SOURCES, [
          target,
        ]).files;

        expect(second.map((file) => file.path)).toEqual(first.map((file) => file.path));
        first.forEach((file, index) => {
          const again = second[index]?.content ?? '';
          expect(again).not.toBe(file.content);
          expect(stripTimestamp(again)).toBe(stripTimestamp(file.content));
        });
      }
    );
  });

  describe('error isolation', () => {
    it('should compile the other sources when one fails to parse', () => {
      const result = compiler.compile(
        [
          { path: 'schemas/listing.yaml', content: LISTING_YAML },
          { path: 'schemas/broken.yaml', content: BROKEN_YAML },
        ],
        ['record']
      );

      expect(result.files.map((file) => file.path)).toEqual(['listing.ts']);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toBeInstanceOf(ParseError);
      expect(result.errors[0]?.context.sourcePath).toBe('schemas/broken.yaml');
    });

    it('should keep the other targets when storage rejects a field', () => {
      const result = compiler.compile([
        { path: 'schemas/listing.yaml', content: LISTING_YAML },
        { path: 'schemas/tagged.yaml', content: TAGGED_YAML },
      ]);

      expect(result.files.map((file) => file.path)).toEqual([
        'listing.ts',
        'tagged.ts',
        'listing.types.ts',
        'tagged.types.ts',
        'listing.extraction.ts',
        'tagged.extraction.ts',
      ]);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toBeInstanceOf(UnsupportedTypeError);
      expect(result.errors[0]?.context).toMatchObject({ schema: 'Tagged', field: 'cats' });
    });

    it('should fail only the child invocations when a parent does not parse', () => {
      const result = compiler.compile(
        [
          { path: 'schemas/broken.yaml', content: BROKEN_YAML },
          { path: 'schemas/venue.yaml', content: VENUE_YAML },
          { path: 'schemas/account.yaml', content: ACCOUNT_YAML },
        ],
        ['record', 'interface']
      );

      expect(result.files.map((file) => file.path)).toEqual(['venue.ts', 'account.ts', 'account.types.ts']);
      expect(result.errors.map((error) => error.name)).toEqual(['ParseError', 'ParentSchemaNotFoundError']);
      expect(result.errors[1]).toBeInstanceOf(ParentSchemaNotFoundError);
      expect(result.errors[1]?.message).toBe("[Venue (schemas/venue.yaml)] Parent schema 'Listing' could not be loaded");
    });
  });

  describe('parse', () => {
    it('should report a repeated schema name and keep the first definition', () => {
      const result = compiler.parse([
        { path: 'schemas/a.yaml', content: LISTING_YAML },
        { path: 'schemas/b.yaml', content: LISTING_YAML },
      ]);

      expect(result.schemas.map((schema) => schema.sourcePath)).toEqual(['schemas/a.yaml']);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toBeInstanceOf(ParseError);
      expect(result.errors[0]?.message).toBe(
        "[Listing (schemas/b.yaml)] Schema 'Listing' is already defined in schemas/a.yaml"
      );
    });
  });
});
