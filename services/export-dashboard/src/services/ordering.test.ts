import { describe, expect, it } from '@jest/globals';
import type { BroadCategory, NamedRow } from '../domain/types.js';
import { sortByCategoryThenValue, summarizeCategories } from './ordering.js';

function row(rankedName: string, category: BroadCategory, value: number | null): NamedRow {
  return {
    commodityName: rankedName,
    rankedName,
    categoryCode: '0000',
    category,
    period: new Date(Date.UTC(2024, 0, 1)),
    value,
    quantity: null,
    unitPrice: null,
    province: 'Saskatchewan',
  };
}

describe('sortByCategoryThenValue', () => {
  it('orders categories by total, then commodities within each category', () => {
    const rows = [
      row('Wheat A', 'Wheat Complex', 100),
      row('Wheat B', 'Wheat Complex', 50),
      row('Barley C', 'Barley Family', 200),
    ];
    expect(sortByCategoryThenValue(rows)).toEqual(['Barley C', 'Wheat A', 'Wheat B']);
  });

  it('keeps a large commodity behind a bigger category', () => {
    const rows = [
      row('Potash', 'Potash', 90),
      row('Peas', 'Pulses Complex', 60),
      row('Lentils', 'Pulses Complex', 50),
      row('Peas', 'Pulses Complex', null),
    ];
    expect(sortByCategoryThenValue(rows)).toEqual(['Peas', 'Lentils', 'Potash']);
  });

  it('lists every distinct name exactly once', () => {
    const rows = [
      row('A', 'Wheat Complex', 5),
      row('B', 'Potash', 7),
      row('A', 'Wheat Complex', 5),
      row('C', 'Wheat Complex', null),
      row('B', 'Potash', 1),
    ];
    const order = sortByCategoryThenValue(rows);
    expect([...order].sort()).toEqual(['A', 'B', 'C']);
    expect(order).toEqual(['A', 'C', 'B']);
  });
});

describe('summarizeCategories', () => {
  it('reports totals per category', () => {
    const rows = [row('Wheat A', 'Wheat Complex', 100), row('Barley C', 'Barley Family', 200), row('Wheat B', 'Wheat Complex', 50)];
    expect(summarizeCategories(rows)).toEqual([
      { category: 'Barley Family', totalValue: 200, commodities: ['Barley C'] },
      { category: 'Wheat Complex', totalValue: 150, commodities: ['Wheat A', 'Wheat B'] },
    ]);
  });
});
