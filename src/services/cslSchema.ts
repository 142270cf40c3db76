import fs from 'fs';
import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
// Ajv v8 ships no formats; CSL data uses none today but overriding schemas may (uri, date)
import addFormats from 'ajv-formats';
import pinnedSchema from '../../schemas/csl-data.json';
import { getRuntimeConfig } from '../config/runtimeConfig';
import { JsonObject, JsonPath, JsonValue, isJsonObject } from '../models/cslItem';
import { isPathPrefix, pointerToPath } from '../utils/jsonPath';
import { CslValidationError } from './errors';
import { logDebug } from './logger';

/**
 * One schema violation. Composite keywords (anyOf / oneOf) carry the violations of
 * their branches in `context`, with paths relative to the composite's instance.
 */
export interface SchemaViolation {
  path: JsonPath;
  absolutePath: JsonPath;
  schemaPath: string;
  keyword: string;
  message: string;
  params: Record<string, unknown>;
  parentSchema: unknown;
  context: SchemaViolation[];
}

export interface CslValidator {
  readonly schema: JsonObject;
  validate(instance: JsonValue): void;
  iterErrors(instance: JsonValue): SchemaViolation[];
  isValid(instance: JsonValue): boolean;
}

const COMPOSITE_KEYWORDS = new Set(['anyOf', 'oneOf']);

function toViolation(err: ErrorObject, root: JsonValue): SchemaViolation {
  const absolutePath = pointerToPath(err.instancePath, root);
  return {
    path: absolutePath,
    absolutePath,
    schemaPath: err.schemaPath,
    keyword: err.keyword,
    message: err.message ?? err.keyword,
    params: { ...err.params },
    parentSchema: err.parentSchema,
    context: [],
  };
}

/**
 * Ajv reports branch errors flat, immediately before the failing composite error.
 * Fold them back under the composite that produced them.
 */
export function nestViolations(errors: readonly ErrorObject[], root: JsonValue): SchemaViolation[] {
  const pending: SchemaViolation[] = [];
  for(const err of errors){
    const v = toViolation(err, root);
    if(COMPOSITE_KEYWORDS.has(err.keyword)){
      const prefix = `${err.schemaPath}/`;
      const children: SchemaViolation[] = [];
      const rest: SchemaViolation[] = [];
      for(const p of pending){
        const mine = p.schemaPath.startsWith(prefix) && isPathPrefix(v.absolutePath, p.absolutePath);
        (mine ? children : rest).push(p);
      }
      pending.length = 0;
      pending.push(...rest);
      v.context = children.map(c => ({ ...c, path: c.absolutePath.slice(v.absolutePath.length) }));
    }
    pending.push(v);
  }
  return pending;
}

function flattenMessages(violations: SchemaViolation[]): string[] {
  return violations.map(v => `${v.absolutePath.join('/') || '(root)'}: ${v.message}`);
}

function loadSchema(): JsonObject {
  const file = getRuntimeConfig().schema.file;
  if(!file){
    const pinned: unknown = pinnedSchema;
    if(!isJsonObject(pinned)) throw new CslValidationError('pinned CSL schema is not a JSON object');
    return pinned;
  }
  const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  if(!isJsonObject(parsed)) throw new CslValidationError(`CSL schema at ${file} is not a JSON object`);
  return parsed;
}

export function createCslValidator(schema: JsonObject): CslValidator {
  const ajv = new Ajv({ allErrors: true, strict: false, verbose: true });
  addFormats(ajv);
  const compiled: ValidateFunction = ajv.compile(schema);
  const iterErrors = (instance: JsonValue): SchemaViolation[] => {
    if(compiled(instance)) return [];
    return nestViolations(compiled.errors ?? [], instance);
  };
  return {
    schema,
    iterErrors,
    isValid: (instance: JsonValue) => compiled(instance) === true,
    validate(instance: JsonValue){
      const violations = iterErrors(instance);
      if(violations.length) throw new CslValidationError('CSL data failed JSON Schema validation', flattenMessages(violations));
    },
  };
}

// Process-wide, built once and never mutated afterwards.
let _validator: CslValidator | undefined;

export function getCslValidator(): CslValidator {
  if(!_validator){
    _validator = createCslValidator(loadSchema());
    logDebug('csl_validator_init', { override: getRuntimeConfig().schema.file ?? null });
  }
  return _validator;
}

export function resetCslValidator(){ _validator = undefined; }
