import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { CreateOrderDto } from './create-order.dto';

function violations(payload: Record<string, unknown>): Record<string, string[]> {
  const errors = validateSync(plainToInstance(CreateOrderDto, payload));
  return Object.fromEntries(
    errors.map((error) => [error.property, Object.keys(error.constraints ?? {}).sort()]),
  );
}

describe('CreateOrderDto', () => {
  const valid = { user_id: 1, item_id: 5, start_date: '2025-01-01', end_date: '2025-01-05' };

  it('accepts a well-formed payload', () => {
    expect(violations(valid)).toEqual({});
  });

  it('accepts a single-day rental', () => {
    expect(violations({ ...valid, end_date: '2025-01-01' })).toEqual({});
  });

  it('rejects an end date before the start date', () => {
    expect(violations({ ...valid, end_date: '2024-12-31' })).toEqual({ end_date: ['isOnOrAfter'] });
  });

  it('reports missing ids', () => {
    expect(violations({ start_date: '2025-01-01', end_date: '2025-01-05' })).toEqual({
      user_id: ['isInt', 'isPositive'],
      item_id: ['isInt', 'isPositive'],
    });
  });

  it('reports a malformed date without comparing the range', () => {
    expect(violations({ ...valid, start_date: '2025-02-30' })).toEqual({
      start_date: ['isCalendarDate'],
    });
  });
});
