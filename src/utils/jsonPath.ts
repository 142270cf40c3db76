import { JsonPath, JsonPathSegment, JsonValue, isJsonObject } from '../models/cslItem';

/** Descend path; undefined when any step is missing or not a container. */
export function getAt(root: JsonValue | undefined, path: JsonPath): JsonValue | undefined {
  let node: JsonValue | undefined = root;
  for(const seg of path){
    if(Array.isArray(node)){
      if(typeof seg !== 'number' || seg < 0 || seg >= node.length) return undefined;
      node = node[seg];
    } else if(isJsonObject(node)){
      if(typeof seg !== 'string' || !Object.prototype.hasOwnProperty.call(node, seg)) return undefined;
      node = node[seg];
    } else {
      return undefined;
    }
  }
  return node;
}

/**
 * Delete the element at path. Array elements are spliced out (later indices shift down),
 * object keys removed. Returns false when nothing existed at path; the root itself is never deleted.
 */
export function deleteAt(root: JsonValue, path: JsonPath): boolean {
  if(!path.length) return false;
  const parent = getAt(root, path.slice(0, -1));
  const tail = path[path.length - 1];
  if(Array.isArray(parent)){
    if(typeof tail !== 'number' || tail < 0 || tail >= parent.length) return false;
    parent.splice(tail, 1);
    return true;
  }
  if(isJsonObject(parent)){
    if(typeof tail !== 'string' || !Object.prototype.hasOwnProperty.call(parent, tail)) return false;
    delete parent[tail];
    return true;
  }
  return false;
}

/**
 * Convert an RFC 6901 JSON Pointer ("/0/author/1") into path segments, using the
 * instance to tell array indices from object keys.
 */
export function pointerToPath(pointer: string, root: JsonValue | undefined): JsonPath {
  if(!pointer) return [];
  const tokens = pointer.split('/').slice(1).map(t => t.replace(/~1/g, '/').replace(/~0/g, '~'));
  const out: JsonPath = [];
  let node: JsonValue | undefined = root;
  for(const token of tokens){
    let seg: JsonPathSegment = token;
    if(Array.isArray(node) && /^(0|[1-9][0-9]*)$/.test(token)) seg = Number(token);
    out.push(seg);
    node = getAt(node, [seg]);
  }
  return out;
}

export function formatPath(path: JsonPath): string {
  return path.map(String).join('/');
}

function compareSegments(a: JsonPathSegment, b: JsonPathSegment): number {
  if(typeof a === 'number' && typeof b === 'number') return a - b;
  if(typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  return typeof a === 'number' ? -1 : 1;
}

/** Lexicographic ordering of paths; a prefix sorts before its extensions. */
export function comparePaths(a: JsonPath, b: JsonPath): number {
  const n = Math.min(a.length, b.length);
  for(let i = 0; i < n; i++){
    const c = compareSegments(a[i], b[i]);
    if(c !== 0) return c;
  }
  return a.length - b.length;
}

export function isPathPrefix(prefix: JsonPath, path: JsonPath): boolean {
  if(prefix.length > path.length) return false;
  return prefix.every((seg, i) => seg === path[i]);
}
