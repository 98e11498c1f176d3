import { describe, it, expect } from 'vitest';
import { isCalendarDate, validateCustomOrder } from '@/validation/order.validation';

const validOrder = {
  customerName: '  Grace ',
  email: 'grace@example.com',
  category: 'cake',
  details: 'Chocolate birthday cake for 12',
};

describe('validateCustomOrder', () => {
  it('accepts a minimal order and fills in the quantity', () => {
    expect(validateCustomOrder(validOrder)).toEqual({
      success: true,
      data: {
        customerName: 'Grace',
        email: 'grace@example.com',
        category: 'cake',
        details: 'Chocolate birthday cake for 12',
        quantity: 1,
      },
    });
  });

  it('coerces numeric strings', () => {
    const result = validateCustomOrder({ ...validOrder, quantity: '3', budget: '45.5', neededBy: '2025-05-10' });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.quantity).toBe(3);
      expect(result.data.budget).toBe(45.5);
      expect(result.data.neededBy).toBe('2025-05-10');
    }
  });

  it('reports every invalid field', () => {
    const result = validateCustomOrder({ email: 'grace@example.com', category: 'cake', details: 'x', quantity: 0 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.map((e) => e.path)).toEqual(['customerName', 'quantity']);
    }
  });

  it('requires neededBy as a plain date', () => {
    const result = validateCustomOrder({ ...validOrder, neededBy: 'next week' });

    expect(result).toEqual({
      success: false,
      error: [{ path: 'neededBy', message: 'neededBy must be a date in YYYY-MM-DD format' }],
    });
  });

  it.each(['2025-02-30', '2025-02-31', '2025-04-31', '2025-13-01'])('rejects the impossible date %s', (neededBy) => {
    expect(validateCustomOrder({ ...validOrder, neededBy })).toEqual({
      success: false,
      error: [{ path: 'neededBy', message: 'neededBy must be a real calendar date' }],
    });
  });

  it('accepts a leap day', () => {
    expect(validateCustomOrder({ ...validOrder, neededBy: '2024-02-29' }).success).toBe(true);
  });

  it('does not coerce null or booleans into numbers', () => {
    const result = validateCustomOrder({ ...validOrder, budget: null, quantity: true });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.map((e) => e.path)).toEqual(['quantity', 'budget']);
    }
  });

  it('rejects non-numeric strings for numeric fields', () => {
    const result = validateCustomOrder({ ...validOrder, budget: 'a lot' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.map((e) => e.path)).toEqual(['budget']);
    }
  });

  it('rejects a body that is not an object', () => {
    const result = validateCustomOrder(null);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error[0].path).toBe('root');
    }
  });
});

describe('isCalendarDate', () => {
  it('rejects days that roll into the next month', () => {
    expect(isCalendarDate(2025, 2, 28)).toBe(true);
    expect(isCalendarDate(2025, 2, 29)).toBe(false);
    expect(isCalendarDate(2025, 0, 10)).toBe(false);
  });
});
