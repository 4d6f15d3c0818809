/**
 * JSON Schemas for the resources the CLI hands to the engine.
 */

export interface DictionaryDefinition {
  part_of_speech?: string | null;
}

export interface DictionaryEntry {
  definitions: DictionaryDefinition[];
}

export type DictionaryDocument = Record<string, DictionaryEntry>;

export type TargetHashDocument = string[];

export const DICTIONARY_SCHEMA = {
  $id: 'phrasemask:dictionary',
  type: 'object',
  additionalProperties: {
    type: 'object',
    required: ['definitions'],
    properties: {
      definitions: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            part_of_speech: { type: ['string', 'null'] },
          },
        },
      },
    },
  },
} as const;

export const TARGET_HASHES_SCHEMA = {
  $id: 'phrasemask:target-hashes',
  type: 'array',
  items: {
    type: 'string',
    pattern: '^\\s*[0-9a-fA-F]+\\s*$',
  },
} as const;
