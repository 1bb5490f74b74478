/**
 * Unit Tests: Console output routing
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { configureOutput, info, printResult } from '../../src/utils/output.js';

describe('output', () => {
  afterEach(() => {
    configureOutput('human');
    vi.restoreAllMocks();
  });

  it('should print the result as JSON on stdout', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    printResult({ success: true, message: 'Nothing to do' });

    expect(log).toHaveBeenCalledWith('{\n  "success": true,\n  "message": "Nothing to do"\n}');
  });

  it('should move human output to stderr in JSON mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    configureOutput('json');
    info('Loading definitions');

    expect(log).not.toHaveBeenCalled();
    expect(err).toHaveBeenCalledWith('ℹ', 'Loading definitions');
  });
});
