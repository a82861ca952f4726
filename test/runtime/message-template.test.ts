import { describe, it, expect, vi } from 'vitest';
import { MessageTemplate, tokenizeTemplate } from '../../src/runtime/message-template.js';

describe('MessageTemplate', () => {
  describe('tokenizeTemplate', () => {
    it('splits text and placeholders', () => {
      expect(tokenizeTemplate('Hi {Name}!')).toEqual([
        { kind: 'text', text: 'Hi ' },
        { kind: 'placeholder', name: 'Name' },
        { kind: 'text', text: '!' }
      ]);
    });

    it('keeps malformed braces as text', () => {
      expect(tokenizeTemplate('a { b } {c')).toEqual([{ kind: 'text', text: 'a { b } {c' }]);
    });

    it('keeps empty braces as text', () => {
      expect(tokenizeTemplate('{}{X}')).toEqual([
        { kind: 'text', text: '{}' },
        { kind: 'placeholder', name: 'X' }
      ]);
    });
  });

  describe('render', () => {
    it('lists placeholders in order of first appearance', () => {
      const template = new MessageTemplate('X {A} {B} {A}');

      expect(template.placeholders).toEqual(['A', 'B']);
      expect(template.has('B')).toBe(true);
      expect(template.has('C')).toBe(false);
    });

    it('never expands substituted values again', () => {
      const template = new MessageTemplate('{A}-{B}');

      expect(template.render(name => (name === 'A' ? '{B}' : 'x'))).toBe('{B}-x');
    });

    it('resolves each distinct placeholder once', () => {
      const resolve = vi.fn(() => 'v');
      const template = new MessageTemplate('{A}{A}');

      expect(template.render(resolve)).toBe('vv');
      expect(resolve).toHaveBeenCalledTimes(1);
    });

    it('keeps unresolved placeholders as written', () => {
      const template = new MessageTemplate('Value {Unknown} here');

      expect(template.render(() => undefined)).toBe('Value {Unknown} here');
    });
  });
});
