/**
 * Tests for word splitting and case conversion.
 */
import { describe, it, expect } from 'vitest';
import {
  splitWords,
  toCase,
  convertCase,
  matchesCase,
  describeCase,
} from '../../../../src/core/naming/case.js';

describe('case', () => {
  describe('splitWords', () => {
    it.each([
      ['OrderItemService', ['order', 'item', 'service']],
      ['orderItem', ['order', 'item']],
      ['order_item', ['order', 'item']],
      ['order-item', ['order', 'item']],
      ['Order Item', ['order', 'item']],
      ['HTTPClient', ['http', 'client']],
      ['user_profile-v2', ['user', 'profile', 'v2']],
      ['  ', []],
    ])('%s -> %o', (input, expected) => {
      expect(splitWords(input)).toEqual(expected);
    });
  });

  describe('toCase', () => {
    const words = ['order', 'item'];

    it.each([
      ['snake_case', 'order_item'],
      ['kebab-case', 'order-item'],
      ['camelCase', 'orderItem'],
      ['PascalCase', 'OrderItem'],
      ['UPPER_CASE', 'ORDER_ITEM'],
    ] as const)('%s', (style, expected) => {
      expect(toCase(words, style)).toBe(expected);
    });
  });

  it('should convert between styles', () => {
    expect(convertCase('order item', 'PascalCase')).toBe('OrderItem');
    expect(convertCase('OrderItem', 'snake_case')).toBe('order_item');
    expect(convertCase('place order', 'camelCase')).toBe('placeOrder');
  });

  describe('matchesCase', () => {
    it('should accept names in the style', () => {
      expect(matchesCase('order-item', 'kebab-case')).toBe(true);
      expect(matchesCase('order_item', 'snake_case')).toBe(true);
      expect(matchesCase('OrderItem', 'PascalCase')).toBe(true);
      expect(matchesCase('orderItem', 'camelCase')).toBe(true);
      expect(matchesCase('ORDER_ITEM', 'UPPER_CASE')).toBe(true);
    });

    it('should reject names in other styles', () => {
      expect(matchesCase('orderItem', 'kebab-case')).toBe(false);
      expect(matchesCase('order-item', 'snake_case')).toBe(false);
      expect(matchesCase('order_item', 'kebab-case')).toBe(false);
      expect(matchesCase('Order-item', 'kebab-case')).toBe(false);
      expect(matchesCase('order--item', 'kebab-case')).toBe(false);
    });
  });

  it('should describe a style with an example', () => {
    expect(describeCase('kebab-case')).toBe('kebab-case (e.g. order-item)');
  });
});
