import type { SchemaObject } from 'ajv';

const scalarSchema = { type: ['string', 'number', 'boolean', 'null'] };

const paramSchema = {
  anyOf: [scalarSchema, { type: 'array', items: scalarSchema }],
};

const messageOptionSchema = {
  type: 'object',
  properties: {
    message: { type: 'string' },
  },
  required: ['message'],
  additionalProperties: false,
};

const ruleEntrySchema = {
  anyOf: [
    { type: 'string', minLength: 1 },
    {
      type: 'array',
      minItems: 1,
      items: { anyOf: [paramSchema, messageOptionSchema] },
    },
    {
      type: 'object',
      properties: {
        name: { type: 'string', minLength: 1 },
        params: { type: 'array', items: paramSchema },
        message: { type: 'string' },
      },
      required: ['name', 'params'],
      additionalProperties: false,
    },
  ],
};

const ruleMapSchema = {
  type: 'object',
  additionalProperties: {
    anyOf: [ruleEntrySchema, { type: 'array', items: ruleEntrySchema }],
  },
};

const conditionalSchema = {
  type: 'object',
  properties: {
    when: { type: 'object', additionalProperties: scalarSchema },
    then: ruleMapSchema,
    else: ruleMapSchema,
  },
  required: ['when', 'then'],
  additionalProperties: false,
};

export const declarationSchemaId = 'https://field-rules.local/declaration.schema.json';

export const declarationSchema: SchemaObject = {
  $id: declarationSchemaId,
  type: 'object',
  properties: {
    description: { type: 'string' },
    locale: { type: 'string', minLength: 1 },
    rules: ruleMapSchema,
    conditionals: {
      type: 'array',
      items: conditionalSchema,
    },
  },
  additionalProperties: false,
};
