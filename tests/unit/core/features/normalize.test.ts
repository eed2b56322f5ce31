/**
 * Tests for feature normalization.
 */
import { describe, it, expect } from 'vitest';
import { normalizeFeatures, normalizeOperation } from '../../../../src/core/features/normalize.js';
import type { RawFeature } from '../../../../src/core/features/types.js';
import { FeatureError } from '../../../../src/utils/errors.js';

function raw(entity: string, operations: string[] = [], fields: Array<[string, string]> = []): RawFeature {
  return { entity, operations, fields: fields.map(([name, type]) => ({ name, type })) };
}

function captureFeatureError(fn: () => unknown): FeatureError {
  try {
    fn();
  } catch (error) {
    if (error instanceof FeatureError) return error;
    throw error;
  }
  throw new Error('expected a FeatureError');
}

describe('normalizeFeatures', () => {
  describe('normalizeOperation', () => {
    it.each([
      ['read', ['get']],
      ['Fetch', ['get']],
      ['index', ['list']],
      ['add', ['create']],
      ['modify', ['update']],
      ['destroy', ['delete']],
      ['crud', ['create', 'get', 'list', 'update', 'delete']],
      ['place order', ['placeOrder']],
      ['mark_paid', ['markPaid']],
    ])('%s -> %o', (token, expected) => {
      expect(normalizeOperation(token)).toEqual(expected);
    });

    it('should reject tokens that are not identifiers', () => {
      expect(normalizeOperation('2fa')).toBeNull();
      expect(normalizeOperation('do/undo')).toBeNull();
    });
  });

  it('should produce PascalCase entities sorted by name', () => {
    const set = normalizeFeatures([raw('order item'), raw('account')]);

    expect(set.entities.map((e) => e.name)).toEqual(['Account', 'OrderItem']);
    expect(set.entities[1].words).toEqual(['order', 'item']);
  });

  it('should order CRUD operations first, then custom ones', () => {
    const set = normalizeFeatures([raw('Order', ['cancel', 'list', 'create', 'refund', 'get'])]);

    expect(set.entities[0].operations).toEqual([
      { name: 'create', kind: 'crud' },
      { name: 'get', kind: 'crud' },
      { name: 'list', kind: 'crud' },
      { name: 'cancel', kind: 'custom' },
      { name: 'refund', kind: 'custom' },
    ]);
  });

  it('should apply the default operations', () => {
    expect(normalizeFeatures([raw('Tag')]).entities[0].operations.map((o) => o.name)).toEqual([
      'create',
      'get',
      'list',
      'update',
      'delete',
    ]);
    expect(
      normalizeFeatures([raw('Tag')], { defaultOperations: ['list', 'get'] }).entities[0].operations.map((o) => o.name)
    ).toEqual(['get', 'list']);
  });

  it('should resolve field types and references', () => {
    const set = normalizeFeatures([
      raw('Order', ['create'], [
        ['owner', 'user'],
        ['placed at', 'timestamp'],
        ['count', 'INT'],
      ]),
      raw('User', ['get']),
    ]);

    expect(set.entities[0].fields).toEqual([
      { name: 'owner', type: 'User', reference: 'User' },
      { name: 'placedAt', type: 'datetime' },
      { name: 'count', type: 'integer' },
    ]);
  });

  it('should merge repeated entities', () => {
    const set = normalizeFeatures([
      { ...raw('Order', ['create'], [['total', 'number']]), description: 'first' },
      { ...raw('order', ['cancel'], [['total', 'number']]), description: 'second' },
    ]);

    expect(set.entities).toHaveLength(1);
    expect(set.entities[0].description).toBe('first');
    expect(set.entities[0].operations.map((o) => o.name)).toEqual(['create', 'cancel']);
    expect(set.entities[0].fields).toEqual([{ name: 'total', type: 'number' }]);
  });

  it('should fail with F005 for an empty descriptor', () => {
    expect(captureFeatureError(() => normalizeFeatures([])).code).toBe('F005');
  });

  it('should fail with F002 for invalid entity names', () => {
    expect(captureFeatureError(() => normalizeFeatures([raw('9lives')])).code).toBe('F002');
  });

  it('should fail with F003 for unknown field types', () => {
    const error = captureFeatureError(() => normalizeFeatures([raw('Order', [], [['owner', 'Customer']])]));
    expect(error.code).toBe('F003');
  });

  it('should fail with F004 for conflicting field types', () => {
    const error = captureFeatureError(() =>
      normalizeFeatures([raw('Order', [], [['total', 'number']]), raw('Order', [], [['total', 'string']])])
    );
    expect(error.code).toBe('F004');
    expect(error.message).toContain('Field Order.total is declared as both number and string');
  });

  it('should report every issue together with line numbers', () => {
    const error = captureFeatureError(() =>
      normalizeFeatures([
        { ...raw('Order', [], [['owner', 'Ghost']]), line: 2 },
        { ...raw('-bad'), line: 5 },
      ])
    );

    expect(error.code).toBe('F002');
    expect(error.message).toBe(
      [
        'Feature descriptor has 2 issue(s):',
        '  line 5: Invalid entity name "-bad": must start with a letter and contain only letters, digits, spaces, _ or -',
        '  line 2: Field Order.owner has unknown type "Ghost" (expected one of string, text, number, integer, float, boolean, date, datetime, uuid, json or an entity name)',
      ].join('\n')
    );
  });
});
