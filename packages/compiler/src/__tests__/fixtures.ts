/**
 * Schema sources shared by the compiler tests
 */

import type { FieldDefinition, SchemaDefinition } from '../ir/types.js';
import { parseSchema } from '../parser/schema-parser.js';

export const GENERATED_AT = new Date('2026-01-15T09:30:00.000Z');

export const LISTING_YAML = `
schema:
  name: Listing
  description: Base listing shared by every entity kind
fields:
  - name: entity_id
    type: string
    description: Unique identifier
    required: true
    primary_key: true
    default: cuid()
  - name: entity_name
    type: string
    description: Official name of the entity
    nullable: false
    required: true
    index: true
    search:
      category: identity
      keywords: [name, title]
    overrides:
      extraction:
        validators: [non_empty]
  - name: slug
    type: string
    description: URL-safe identifier
    required: true
    unique: true
    internal: true
  - name: categories
    type: list[string]
    description: Free-form category labels
    overrides:
      storage:
        type: String[]
  - name: phone
    type: string
    description: Contact phone number
    overrides:
      extraction:
        validators: [e164_phone]
  - name: accepts_cards
    type: boolean
    description: Whether card payments are accepted
  - name: attributes
    type: json
    description: Structured attributes
  - name: updated_at
    type: datetime
    description: Last modification time
    required: true
    internal: true
    default: now()
`;

export const VENUE_YAML = `
schema:
  name: Venue
  description: A place that hosts events
  extends: Listing
fields:
  - name: capacity
    type: integer
    description: Seating capacity
`;

export const ACCOUNT_YAML = `
schema:
  name: Account
  description: Registered account
fields:
  - name: id
    type: string
    primary_key: true
    required: true
  - name: email
    type: string
    required: true
    unique: true
    index: true
  - name: display_name
    type: string
    index: true
  - name: settings
    type: json
  - name: login_count
    type: integer
    required: true
    default: 0
  - name: tags
    type: list[string]
    overrides:
      storage:
        skip: true
  - name: updated_at
    type: datetime
    required: true
    default: now()
`;

export function parseListing(): SchemaDefinition {
  return parseSchema(LISTING_YAML, { sourcePath: 'schemas/listing.yaml' });
}

export function parseVenue(): SchemaDefinition {
  return parseSchema(VENUE_YAML, { sourcePath: 'schemas/venue.yaml' });
}

export function parseAccount(): SchemaDefinition {
  return parseSchema(ACCOUNT_YAML, { sourcePath: 'schemas/account.yaml' });
}

/**
 * A nullable, optional string field with the given adjustments
 */
export function makeField(name: string, overrides: Partial<FieldDefinition> = {}): FieldDefinition {
  return {
    name,
    type: { kind: 'scalar', name: 'string' },
    description: '',
    nullable: true,
    required: false,
    index: false,
    unique: false,
    primaryKey: false,
    internal: false,
    overrides: {},
    ...overrides,
  };
}

export function makeSchema(
  name: string,
  fields: FieldDefinition[],
  extra: Partial<Omit<SchemaDefinition, 'name' | 'fields'>> = {}
): SchemaDefinition {
  return {
    name,
    description: `${name} schema`,
    fields,
    extractionFields: [],
    sourcePath: `schemas/${name.toLowerCase()}.yaml`,
    ...extra,
  };
}
