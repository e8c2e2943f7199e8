import { describe, it, expect } from 'vitest';
import { name, normalizePackageName, ConsoleLogger, ConfigSchema } from './index';

describe('shared package', () => {
  it('exports name', () => {
    expect(name).toBe('@typecensus/shared');
  });

  it('re-exports the public surface', () => {
    expect(normalizePackageName('A.B')).toBe('a-b');
    expect(new ConsoleLogger()).toBeDefined();
    expect(ConfigSchema.parse({}).configVersion).toBe(1);
  });
});
