import { describe, expect, test } from 'vitest';
import { TreeStyle } from '../../src/renderer/tree.style.ts';

describe('TreeStyle', () => {
  test('default is colored unicode with header', () => {
    const style = TreeStyle.default();
    expect(style.colored).toBe(true);
    expect(style.showHeader).toBe(true);
    expect(style.indent).toBe('    ');
    expect(style.branch).toBe('├── ');
    expect(style.corner).toBe('└── ');
    expect(style.vertical).toBe('│   ');
  });

  test('plain keeps the glyphs and drops color', () => {
    const style = TreeStyle.plain();
    expect(style.colored).toBe(false);
    expect(style.branch).toBe('├── ');
  });

  test('ascii swaps glyphs and keeps color', () => {
    const style = TreeStyle.ascii();
    expect(style.colored).toBe(true);
    expect(style.branch).toBe('|-- ');
    expect(style.corner).toBe('`-- ');
    expect(style.vertical).toBe('|   ');
    expect(style.indent).toBe('    ');
  });

  test('with* return a new style', () => {
    const ascii = TreeStyle.ascii();
    const plain = ascii.withColor(false).withHeader(false);
    expect(plain.colored).toBe(false);
    expect(plain.showHeader).toBe(false);
    expect(plain.corner).toBe('`-- ');
    expect(ascii.colored).toBe(true);
    expect(ascii.showHeader).toBe(true);
  });

  test('partial options fill from defaults', () => {
    const style = new TreeStyle({ vertical: '!   ' });
    expect(style.vertical).toBe('!   ');
    expect(style.branch).toBe('├── ');
  });
});
