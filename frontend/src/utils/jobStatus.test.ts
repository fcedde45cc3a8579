import { describe, it, expect } from 'vitest';
import { getStatusClass, isActive } from './jobStatus';

describe('job status helpers', () => {
  it('should group running stages', () => {
    expect(isActive('encoding')).toBe(true);
    expect(isActive('preparing')).toBe(true);
    expect(isActive('pending')).toBe(false);
    expect(isActive('cancelled')).toBe(false);
  });

  it('should pick a badge class', () => {
    expect(getStatusClass('validating')).toBe('status-processing');
    expect(getStatusClass('cancelled')).toBe('status-cancelled');
    expect(getStatusClass('completed')).toBe('status-completed');
  });
});
