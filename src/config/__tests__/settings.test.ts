import { describe, it, expect } from 'vitest';
import { loadSettings, resolveTolerance } from '../settings.js';

describe('loadSettings', () => {
  it('applies defaults for unset and empty values', () => {
    const settings = loadSettings({ LOG_LEVEL: '', FUSION_OUTPUT_DIR: '' });

    expect(settings.LOG_LEVEL).toBe('info');
    expect(settings.FUSION_BREAKPOINT_TOLERANCE).toBe(0);
    expect(settings.FUSION_OUTPUT_DIR).toBe('out');
    expect(settings.FUSION_PROJECT_NAME).toBeUndefined();
  });

  it('reads values from the environment', () => {
    const settings = loadSettings({
      LOG_LEVEL: 'debug',
      FUSION_BREAKPOINT_TOLERANCE: '25',
      FUSION_PROJECT_NAME: '002_test_project',
    });

    expect(settings.LOG_LEVEL).toBe('debug');
    expect(settings.FUSION_BREAKPOINT_TOLERANCE).toBe(25);
    expect(settings.FUSION_PROJECT_NAME).toBe('002_test_project');
  });

  it('rejects a negative tolerance', () => {
    expect(() => loadSettings({ FUSION_BREAKPOINT_TOLERANCE: '-1' })).toThrow(
      /Invalid environment configuration:\n {2}- FUSION_BREAKPOINT_TOLERANCE:/
    );
  });
});

describe('resolveTolerance', () => {
  const settings = loadSettings({ FUSION_BREAKPOINT_TOLERANCE: '5' });

  it('prefers the command-line value', () => {
    expect(resolveTolerance('10', settings)).toBe(10);
    expect(resolveTolerance(undefined, settings)).toBe(5);
  });

  it('rejects values that are not whole bases', () => {
    expect(() => resolveTolerance('abc', settings)).toThrow('Invalid breakpoint tolerance: abc');
    expect(() => resolveTolerance('1.5', settings)).toThrow('Invalid breakpoint tolerance: 1.5');
  });
});
