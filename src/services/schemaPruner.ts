import { getRuntimeConfig } from '../config/runtimeConfig';
import { JsonPath, JsonValue, isJsonObject } from '../models/cslItem';
import { comparePaths, deleteAt, formatPath, getAt } from '../utils/jsonPath';
import { CslValidator, SchemaViolation, getCslValidator } from './cslSchema';
import { UnsupportedRepairError } from './errors';
import { logDebug, logWarn } from './logger';

export interface PruneOptions {
  /** Extra repair passes allowed after the first one. Defaults to CITE_PRUNE_DEPTH (5). */
  maxDepth?: number;
  /** Edit the given structure instead of a deep copy. */
  inPlace?: boolean;
  validator?: CslValidator;
}

export type RepairAction =
  | { kind: 'delete'; path: JsonPath; reason: string }
  | { kind: 'warn'; path: JsonPath; reason: string };

const DELETABLE_KEYWORDS = new Set(['enum', 'type', 'minItems', 'maxItems']);

function declaredProperties(parentSchema: unknown): Set<string> {
  if(!isJsonObject(parentSchema)) return new Set();
  const props = parentSchema.properties;
  return new Set(isJsonObject(props) ? Object.keys(props) : []);
}

function planViolation(root: JsonValue, v: SchemaViolation, base: JsonPath, out: RepairAction[]): void {
  const at = [...base, ...v.path];
  if(v.context.length){
    // Every failing branch reports the same extra keys; remove them once per instance path.
    const additionalDone = new Set<string>();
    for(const sub of v.context){
      if(sub.keyword === 'additionalProperties'){
        const key = formatPath([...at, ...sub.path]);
        if(additionalDone.has(key)) continue;
        additionalDone.add(key);
      }
      planViolation(root, sub, at, out);
    }
    return;
  }
  if(v.keyword === 'additionalProperties'){
    const node = getAt(root, at);
    if(!isJsonObject(node)) return;
    const declared = declaredProperties(v.parentSchema);
    const extras = Object.keys(node).filter(k => !declared.has(k));
    for(const key of extras) out.push({ kind: 'delete', path: [...at, key], reason: `${v.message}: ${key}` });
    return;
  }
  if(DELETABLE_KEYWORDS.has(v.keyword)){
    out.push({ kind: 'delete', path: at, reason: v.message });
    return;
  }
  if(v.keyword === 'required'){
    out.push({ kind: 'warn', path: at, reason: v.message });
    return;
  }
  throw new UnsupportedRepairError(v.keyword, at);
}

/**
 * Turn violations into an ordered worklist. Deletions are deduplicated by path and ordered
 * deepest / rightmost first so removing an array element never shifts a pending target.
 */
export function planRepairs(root: JsonValue, violations: readonly SchemaViolation[]): RepairAction[] {
  const ordered = [...violations].sort((a, b) => comparePaths(b.absolutePath, a.absolutePath));
  const planned: RepairAction[] = [];
  for(const v of ordered) planViolation(root, v, [], planned);
  const seen = new Set<string>();
  const deletes: RepairAction[] = [];
  const warnings: RepairAction[] = [];
  for(const action of planned){
    if(action.kind === 'warn'){ warnings.push(action); continue; }
    const key = formatPath(action.path);
    if(seen.has(key)) continue;
    seen.add(key);
    deletes.push(action);
  }
  deletes.sort((a, b) => comparePaths(b.path, a.path));
  return [...warnings, ...deletes];
}

export function applyRepairs(root: JsonValue, actions: readonly RepairAction[]): number {
  let deleted = 0;
  for(const action of actions){
    if(action.kind === 'warn'){
      logWarn('csl_prune_required_missing', { path: formatPath(action.path), reason: action.reason });
      continue;
    }
    if(deleteAt(root, action.path)){
      deleted++;
      logDebug('csl_prune_delete', { path: formatPath(action.path), reason: action.reason });
    }
  }
  return deleted;
}

/**
 * Remove the parts of instance that violate the CSL JSON Schema. When a pass leaves the
 * instance invalid another pass runs, up to maxDepth extra passes; the last state is
 * returned whether or not it validates. Missing required fields cannot be fixed by
 * deletion and are only logged.
 */
export function pruneInstance<T extends JsonValue>(instance: T, options: PruneOptions = {}): T {
  const validator = options.validator ?? getCslValidator();
  let depth = options.maxDepth ?? getRuntimeConfig().prune.maxDepth;
  const target = options.inPlace ? instance : structuredClone(instance);
  for(;;){
    const violations = validator.iterErrors(target);
    if(!violations.length) return target;
    applyRepairs(target, planRepairs(target, violations));
    if(validator.isValid(target) || depth < 1) return target;
    depth--;
  }
}
