import type { Command } from '@oclif/core';
import { describe, expect, it, vi } from 'vitest';
import { formatLineRanges, outputJsonOrPlain } from '../../../src/commands/_shared/output.js';

describe('output utilities', () => {
  describe('outputJsonOrPlain', () => {
    it('outputs indented JSON when json flag is true', () => {
      const logOutput: string[] = [];
      const mockCommand = {
        log: vi.fn((msg: string) => logOutput.push(msg)),
      } as unknown as Command;
      const plainFn = vi.fn();

      outputJsonOrPlain(mockCommand, true, { summary: { covered: 4 } }, plainFn);

      expect(plainFn).not.toHaveBeenCalled();
      expect(logOutput).toEqual(['{\n  "summary": {\n    "covered": 4\n  }\n}']);
    });

    it('calls plainFn when json flag is false', () => {
      const mockCommand = {
        log: vi.fn(),
      } as unknown as Command;
      const plainFn = vi.fn();

      outputJsonOrPlain(mockCommand, false, { gaps: [] }, plainFn);

      expect(plainFn).toHaveBeenCalledOnce();
      expect(mockCommand.log).not.toHaveBeenCalled();
    });
  });

  describe('formatLineRanges', () => {
    it('collapses consecutive lines', () => {
      expect(formatLineRanges([3, 4, 5, 9])).toBe('3-5, 9');
      expect(formatLineRanges([1, 3, 5, 6])).toBe('1, 3, 5-6');
    });

    it('handles empty and single inputs', () => {
      expect(formatLineRanges([])).toBe('');
      expect(formatLineRanges([7])).toBe('7');
    });
  });
});
