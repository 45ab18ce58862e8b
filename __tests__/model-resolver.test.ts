import { describe, it, expect } from 'vitest';
import { resolveTargetModel } from '../src/model-resolver.js';

describe('resolveTargetModel', () => {
  it('uses the rotated model for Messages API model names', () => {
    expect(resolveTargetModel('claude-3-5-sonnet-20241022', 'gpt-4o')).toBe('gpt-4o');
    expect(resolveTargetModel('', 'gpt-4o')).toBe('gpt-4o');
  });

  it('passes upstream model names through', () => {
    expect(resolveTargetModel('gpt-4o-mini', 'gpt-4o')).toBe('gpt-4o-mini');
    expect(resolveTargetModel('deepseek-chat', 'gpt-4o')).toBe('deepseek-chat');
    expect(resolveTargetModel('  o1-preview ', 'gpt-4o')).toBe('o1-preview');
  });

  it('honors custom prefixes', () => {
    expect(resolveTargetModel('qwen-max', 'gpt-4o', ['qwen-'])).toBe('qwen-max');
    expect(resolveTargetModel('gpt-4o-mini', 'qwen-max', ['qwen-'])).toBe('qwen-max');
    expect(resolveTargetModel('gpt-4o-mini', 'qwen-max', [])).toBe('qwen-max');
  });
});
