import { describe, it, expect } from 'vitest';
import {
  parseEmployeeFields,
  parseEmployeeId,
  parseNotice,
  readFormValues,
  toFormValues,
} from '../../../src/modules/employees/employee.schemas';

describe('parseEmployeeFields', () => {
  it('trims text and turns blank optional fields into null', () => {
    const parsed = parseEmployeeFields({
      name: '  Alice ',
      department: 'Eng',
      role: '   ',
      salary: '',
      startDate: '',
    });

    expect(parsed).toEqual({
      success: true,
      data: { name: 'Alice', department: 'Eng', role: null, salary: null, startDate: null },
    });
  });

  it('coerces form strings for salary and keeps ISO start dates', () => {
    const parsed = parseEmployeeFields({
      name: 'Bo',
      department: 'Ops',
      role: 'SRE',
      salary: ' 85000 ',
      startDate: '2024-03-01',
    });

    expect(parsed).toEqual({
      success: true,
      data: { name: 'Bo', department: 'Ops', role: 'SRE', salary: 85000, startDate: '2024-03-01' },
    });
  });

  it('accepts JSON numbers and missing optional fields', () => {
    const parsed = parseEmployeeFields({ name: 'Bo', department: 'Ops', salary: 0 });

    expect(parsed).toEqual({
      success: true,
      data: { name: 'Bo', department: 'Ops', role: null, salary: 0, startDate: null },
    });
  });

  it('names every missing required field', () => {
    expect(parseEmployeeFields({})).toEqual({
      success: false,
      errors: { name: 'Name is required', department: 'Department is required' },
    });
  });

  it('rejects a whitespace-only name', () => {
    expect(parseEmployeeFields({ name: '   ', department: 'Eng' })).toEqual({
      success: false,
      errors: { name: 'Name is required' },
    });
  });

  it('rejects non-text names from JSON payloads', () => {
    expect(parseEmployeeFields({ name: 42, department: 'Eng' })).toEqual({
      success: false,
      errors: { name: 'Name must be text' },
    });
  });

  it('rejects salaries that are not whole non-negative numbers', () => {
    const base = { name: 'Bo', department: 'Ops' };

    expect(parseEmployeeFields({ ...base, salary: 'abc' })).toEqual({
      success: false,
      errors: { salary: 'Salary must be a whole number' },
    });
    expect(parseEmployeeFields({ ...base, salary: '12.5' })).toEqual({
      success: false,
      errors: { salary: 'Salary must be a whole number' },
    });
    expect(parseEmployeeFields({ ...base, salary: '-5' })).toEqual({
      success: false,
      errors: { salary: 'Salary cannot be negative' },
    });
  });

  it('rejects malformed and impossible start dates', () => {
    const base = { name: 'Bo', department: 'Ops' };

    expect(parseEmployeeFields({ ...base, startDate: '03/01/2024' })).toEqual({
      success: false,
      errors: { startDate: 'Start date must be a date (YYYY-MM-DD)' },
    });
    expect(parseEmployeeFields({ ...base, startDate: '2024-02-30' })).toEqual({
      success: false,
      errors: { startDate: 'Start date is not a valid calendar date' },
    });
  });

  it('rejects text longer than 255 characters', () => {
    expect(parseEmployeeFields({ name: 'x'.repeat(256), department: 'Eng' })).toEqual({
      success: false,
      errors: { name: 'Name must be at most 255 characters' },
    });
  });

  it('blames the name field when the payload is not an object', () => {
    expect(parseEmployeeFields('name=Alice')).toEqual({
      success: false,
      errors: { name: 'Name is required' },
    });
  });
});

describe('parseEmployeeId', () => {
  it('accepts positive integer ids', () => {
    expect(parseEmployeeId({ id: '7' })).toBe(7);
  });

  it('returns null for anything that cannot be an id', () => {
    expect(parseEmployeeId({ id: '0' })).toBeNull();
    expect(parseEmployeeId({ id: 'abc' })).toBeNull();
    expect(parseEmployeeId({ id: '1.5' })).toBeNull();
    expect(parseEmployeeId({ id: '99999999999' })).toBeNull();
    expect(parseEmployeeId({})).toBeNull();
  });
});

describe('parseNotice', () => {
  it('reads known notices and ignores the rest', () => {
    expect(parseNotice({ notice: 'created' })).toBe('created');
    expect(parseNotice({ notice: 'hacked' })).toBeNull();
    expect(parseNotice(undefined)).toBeNull();
  });
});

describe('readFormValues', () => {
  it('takes the first value of repeated keys and defaults missing keys to empty', () => {
    expect(readFormValues({ name: ['Alice', 'Bob'], salary: 5 })).toEqual({
      name: 'Alice',
      department: '',
      role: '',
      salary: '5',
      startDate: '',
    });
  });

  it('handles a missing body', () => {
    expect(readFormValues(undefined)).toEqual({
      name: '',
      department: '',
      role: '',
      salary: '',
      startDate: '',
    });
  });
});

describe('toFormValues', () => {
  it('renders nulls as empty inputs', () => {
    expect(
      toFormValues({ name: 'Alice', department: 'Eng', role: null, salary: 0, startDate: null }),
    ).toEqual({ name: 'Alice', department: 'Eng', role: '', salary: '0', startDate: '' });
  });
});
