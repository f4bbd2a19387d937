/**
 * Naming and Header Tests
 */
import { describe, it, expect } from 'vitest';
import { commentText, constantCase, kebabCase, pascalCase, quote } from '../naming.js';
import { renderHeader, stripTimestamp } from '../header.js';
import { GENERATED_AT } from '../../__tests__/fixtures.js';

describe('naming', () => {
  it('should convert schema names between cases', () => {
    expect(kebabCase('VenueProfile')).toBe('venue-profile');
    expect(kebabCase('HTTPServer')).toBe('http-server');
    expect(constantCase('VenueProfile')).toBe('VENUE_PROFILE');
    expect(pascalCase('entity_name')).toBe('EntityName');
    expect(pascalCase('e164_phone')).toBe('E164Phone');
  });

  it('should quote string literals', () => {
    expect(quote("it's\n")).toBe("'it\\'s\\n'");
    expect(quote('C:\\data')).toBe("'C:\\\\data'");
  });

  it('should flatten comment text onto one line', () => {
    expect(commentText('line one\n  line two */')).toBe('line one line two *\\/');
  });
});

describe('header', () => {
  it('should render the generated-file banner', () => {
    expect(renderHeader({ sources: ['schemas/a.yaml', 'schemas/b.yaml'], generatedAt: GENERATED_AT })).toBe(
      [
        '// GENERATED FILE - DO NOT EDIT',
        '// Any manual changes will be overwritten on next generation.',
        '//',
        '// Source: schemas/a.yaml, schemas/b.yaml',
        '// Generated at: 2026-01-15T09:30:00.000Z',
        '//',
        '// To make changes, edit the source schema and run: polyschema generate',
      ].join('\n')
    );
  });

  it('should strip only the generated-at line', () => {
    expect(stripTimestamp('// a\n// Generated at: 2026-01-15T09:30:00.000Z\n// b\n')).toBe('// a\n// b\n');
  });
});
