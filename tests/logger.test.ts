import { describe, it, expect, afterEach, vi } from 'vitest';
import { createLogger } from '../src/core/logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write prefixed info lines to stdout by default', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    createLogger('Analyzer').info('Analyzing A');

    expect(log).toHaveBeenCalledWith('[Analyzer] Analyzing A');
    expect(error).not.toHaveBeenCalled();
  });

  it('should keep stdout clean when info goes to stderr', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    createLogger('Analyzer', true).info('Analyzing A');

    expect(error).toHaveBeenCalledWith('[Analyzer] Analyzing A');
    expect(log).not.toHaveBeenCalled();
  });
});
