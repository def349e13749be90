import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadConfig({}, {})).toEqual({
      success: true,
      config: { defaultPriority: 3, verbose: false },
    });
  });

  it('reads environment variables', () => {
    const loaded = loadConfig({}, { TASKTRACK_DEFAULT_PRIORITY: '5', TASKTRACK_VERBOSE: 'true' });
    expect(loaded).toEqual({ success: true, config: { defaultPriority: 5, verbose: true } });
  });

  it('lets flags override the environment', () => {
    const loaded = loadConfig(
      { defaultPriority: '1', verbose: false },
      { TASKTRACK_DEFAULT_PRIORITY: '5', TASKTRACK_VERBOSE: '1' },
    );
    expect(loaded).toEqual({ success: true, config: { defaultPriority: 1, verbose: false } });
  });

  it('ignores an empty environment value', () => {
    const loaded = loadConfig({}, { TASKTRACK_DEFAULT_PRIORITY: '' });
    expect(loaded.success && loaded.config.defaultPriority).toBe(3);
  });

  it('rejects an out-of-range default priority', () => {
    const loaded = loadConfig({ defaultPriority: '9' }, {});
    expect(loaded).toEqual({
      success: false,
      issues: ['defaultPriority: Number must be less than or equal to 5'],
    });
  });

  it('rejects a non-integer default priority', () => {
    const loaded = loadConfig({ defaultPriority: '2.5' }, {});
    expect(loaded.success).toBe(false);
  });
});
