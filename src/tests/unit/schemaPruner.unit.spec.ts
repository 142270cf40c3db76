import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import fc from 'fast-check';
import { JsonObject, JsonValue } from '../../models/cslItem';
import { createCslValidator, getCslValidator } from '../../services/cslSchema';
import { UnsupportedRepairError } from '../../services/errors';
import { planRepairs, pruneInstance } from '../../services/schemaPruner';

describe('schemaPruner (unit)', () => {
  let errSpy: MockInstance<typeof console.error>;
  beforeAll(() => { errSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined); });
  afterAll(() => { errSpy.mockRestore(); });

  it('leaves valid data untouched', () => {
    const data: JsonValue = [{ id: 'a', type: 'book', title: 'T', author: [{ family: 'Doe', given: 'Jane' }] }];
    expect(pruneInstance(data)).toEqual(data);
  });

  it('removes properties the schema does not declare', () => {
    expect(pruneInstance([{ id: 'a', type: 'book', title: 'T', foo: 'bar', baz: 1 }])).toEqual([{ id: 'a', type: 'book', title: 'T' }]);
  });

  it('removes values of the wrong type', () => {
    expect(pruneInstance([{ id: 'a', type: 'book', title: 5, volume: 3 }])).toEqual([{ id: 'a', type: 'book', volume: 3 }]);
  });

  it('removes array elements that are not items', () => {
    expect(pruneInstance([5, { id: 'a', type: 'book' }])).toEqual([{ id: 'a', type: 'book' }]);
  });

  it('keeps the branch-compatible part of a name that mixes both forms', () => {
    const data: JsonValue = [{ id: 'a', type: 'book', author: [{ family: 'Doe', given: 'Jane', literal: 'Doe Lab' }] }];
    expect(pruneInstance(data)).toEqual([{ id: 'a', type: 'book', author: [{ family: 'Doe', given: 'Jane' }] }]);
  });

  it('nests branch violations under the composite', () => {
    const data: JsonValue = [{ id: 'a', type: 'book', author: [{ family: 'Doe', given: 'Jane', literal: 'Doe Lab' }] }];
    const violations = getCslValidator().iterErrors(data);
    expect(violations).toHaveLength(1);
    expect(violations[0].keyword).toBe('anyOf');
    expect(violations[0].path).toEqual([0, 'author', 0]);
    expect(violations[0].context).toHaveLength(3);
    expect(violations[0].context.every(c => c.keyword === 'additionalProperties')).toBe(true);
    expect(violations[0].context[0].path).toEqual([]);
  });

  it('deletes each array index once, last index first', () => {
    const data: JsonValue = [{ id: 'a', type: 'book', author: [5, { family: 'A' }, 'x'] }];
    const plan = planRepairs(data, getCslValidator().iterErrors(data));
    expect(plan.map(a => a.path)).toEqual([[0, 'author', 2], [0, 'author', 0]]);
    expect(pruneInstance(data)).toEqual([{ id: 'a', type: 'book', author: [{ family: 'A' }] }]);
  });

  it('repairs over several passes', () => {
    const data: JsonValue = [{ id: 'a', type: 'book', issued: { 'date-parts': [[2020, 1, 1, 5]], foo: 1 } }];
    expect(pruneInstance(data)).toEqual([{ id: 'a', type: 'book', issued: {} }]);
    expect(pruneInstance(data, { maxDepth: 0 })).toEqual([{ id: 'a', type: 'book', issued: { 'date-parts': [] } }]);
  });

  it('only warns about missing required fields', () => {
    errSpy.mockClear();
    const data: JsonValue = [{ id: 'a', title: 'T' }];
    expect(pruneInstance(data, { maxDepth: 0 })).toEqual(data);
    expect(errSpy.mock.calls.some(c => String(c[0]).includes('csl_prune_required_missing'))).toBe(true);
  });

  it('deletes a bad enum value and then reports the field as missing', () => {
    expect(pruneInstance([{ id: 'a', type: 'journal-article' }], { maxDepth: 1 })).toEqual([{ id: 'a' }]);
  });

  it('refuses keywords it cannot repair', () => {
    const schema: JsonObject = {
      type: 'array',
      items: { type: 'object', properties: { id: { type: 'string', pattern: '^x' } } }
    };
    const validator = createCslValidator(schema);
    try {
      pruneInstance([{ id: 'y' }], { validator });
      expect.unreachable('pattern violations are not repairable');
    } catch(e){
      expect(e).toBeInstanceOf(UnsupportedRepairError);
      if(e instanceof UnsupportedRepairError){
        expect(e.message).toBe('pattern is not yet supported');
        expect(e.data.path).toEqual([0, 'id']);
      }
    }
  });

  it('copies unless asked to edit in place', () => {
    const data: JsonValue = [{ id: 'a', type: 'book', foo: 1 }];
    const copy = pruneInstance(data);
    expect(copy).not.toBe(data);
    expect(data).toEqual([{ id: 'a', type: 'book', foo: 1 }]);
    const same = pruneInstance(data, { inPlace: true });
    expect(same).toBe(data);
    expect(data).toEqual([{ id: 'a', type: 'book' }]);
  });

  it('is idempotent', () => {
    const name = fc.oneof(
      fc.record({ family: fc.string(), given: fc.string() }, { requiredKeys: ['family'] }),
      fc.record({ literal: fc.string() }),
      fc.record({ family: fc.string(), literal: fc.string() }),
      fc.integer(),
      fc.string()
    );
    const item = fc.record({
      id: fc.oneof(fc.string(), fc.integer(), fc.boolean()),
      type: fc.constantFrom('book', 'article-journal', 'journal-article', 'entry', 'thing'),
      title: fc.oneof(fc.string(), fc.integer()),
      volume: fc.oneof(fc.string(), fc.integer(), fc.constant(null)),
      author: fc.array(name, { maxLength: 4 }),
      extra: fc.string(),
    }, { requiredKeys: [] });
    fc.assert(fc.property(fc.array(item, { maxLength: 3 }), (items) => {
      const data: JsonValue = items;
      const once = pruneInstance(data);
      expect(pruneInstance(once)).toEqual(once);
      const left = getCslValidator().iterErrors(once);
      expect(left.every(v => v.keyword === 'required')).toBe(true);
    }));
  });
});
