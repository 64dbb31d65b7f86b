/**
 * Plain JSON values, as produced by the YAML and JSON policy parsers
 */
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * A JSON-Schema (draft-4) node.
 *
 * Declared as a type alias rather than an interface so that it stays
 * assignable to Ajv's indexed `SchemaObject`.
 */
export type SchemaNode = {
  $schema?: string;
  id?: string;
  $ref?: string;
  title?: string;
  description?: string;
  type?: string | string[];
  enum?: JsonValue[];
  default?: JsonValue;
  format?: string;
  pattern?: string;
  minimum?: number;
  maximum?: number;
  minItems?: number;
  maxItems?: number;
  minProperties?: number;
  maxProperties?: number;
  required?: string[];
  properties?: Record<string, SchemaNode>;
  additionalProperties?: boolean | SchemaNode;
  items?: SchemaNode | SchemaNode[];
  anyOf?: SchemaNode[];
  oneOf?: SchemaNode[];
  allOf?: SchemaNode[];
  not?: SchemaNode;
  definitions?: Record<string, SchemaNode>;
};

/**
 * Definitions emitted for a single resource type
 */
export type ResourceDefinitions = {
  actions: Record<string, SchemaNode>;
  filters: Record<string, SchemaNode>;
  policy: SchemaNode;
};

/**
 * The composite schema document describing every policy shape
 */
export type SchemaDocument = {
  $schema: string;
  id: string;
  definitions: {
    resources: Record<string, ResourceDefinitions>;
    filters: Record<string, SchemaNode>;
    policy: SchemaNode;
    'policy-mode': SchemaNode;
  };
  type: 'object';
  required: string[];
  additionalProperties: boolean;
  properties: Record<string, SchemaNode>;
};

/**
 * A filter or action implementation as seen by the schema engine.
 * Identity matters: registering the same object under two names is an alias.
 */
export interface Capability {
  readonly schema: SchemaNode;
  /** Human help text; empty when the implementation has none */
  readonly doc: string;
}

/**
 * A registered name resolved against its implementation
 */
export interface CapabilityFragment {
  name: string;
  canonicalName: string;
  capability: Capability;
  schema: SchemaNode;
  doc: string;
  isAlias: boolean;
}

/**
 * A user-authored policy, as much as the engine needs to know about it
 */
export interface Policy {
  name: string;
  resource: string;
  filters?: JsonValue[];
  actions?: JsonValue[];
  mode?: JsonValue;
  description?: string;
  tags?: string[];
}

/**
 * A policy file after parsing
 */
export interface PolicyDocument {
  policies: Policy[];
  vars?: Record<string, JsonValue>;
}

/**
 * A structural violation reported against the composite schema
 */
export interface SchemaViolation {
  kind: 'schema';
  /** Schema keyword that failed, e.g. `anyOf`, `required`, `pattern` */
  keyword: string;
  message: string;
  /** JSON pointer into the validated document */
  instancePath: string;
  /** Decoded segments of `instancePath` */
  path: string[];
  schemaPath: string;
  params: Record<string, unknown>;
  /** The failing value */
  instance: unknown;
  /** The failing keyword's value in the schema */
  schema: unknown;
  /** Violations recorded under a failed `anyOf`/`oneOf`, in evaluation order */
  context: SchemaViolation[];
}

/**
 * Two or more policies share a name within one validation run
 */
export interface DuplicateNameViolation {
  kind: 'duplicate-name';
  names: string[];
  message: string;
}

export type ValidationError = SchemaViolation | DuplicateNameViolation;

/**
 * The most specific error for a failed document, with the policy it belongs to
 */
export interface Diagnosis {
  error: ValidationError;
  policy: string;
}

/**
 * A document queued for validation together with others
 */
export interface SourcedDocument {
  source: string;
  document: unknown;
}

/**
 * Per-document outcome of a multi-document validation run
 */
export interface DocumentResult {
  source: string;
  errors: ValidationError[];
  diagnosis?: Diagnosis;
}

/**
 * Browsable listing of one resource type's capabilities
 */
export interface ResourceVocabulary {
  actions: string[];
  filters: string[];
  docs: {
    actions: Record<string, string | null>;
    filters: Record<string, string | null>;
  };
}

export type Vocabulary = Record<string, ResourceVocabulary>;

/**
 * Counts shown by `warden schema --summary`
 */
export interface VocabularySummary {
  resourceCount: number;
  uniqueActions: number;
  commonActions: number;
  uniqueFilters: number;
  commonFilters: number;
}

/**
 * Warden configuration
 */
export interface WardenConfig {
  /** Restrict the schema to these resource types; empty means all */
  resourceTypes: string[];
  summary: {
    commonActions: string[];
    commonFilters: string[];
  };
  server: {
    port: number;
  };
}

/**
 * Process exit codes used by the CLI
 */
export enum ExitCode {
  Success = 0,
  Invalid = 1,
  Usage = 2,
  Fatal = 3,
}
