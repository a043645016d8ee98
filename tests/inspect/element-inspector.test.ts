import { describe, it, expect, vi } from 'vitest';
import { buildCssSelector, inspectElement } from '../../src/inspect/element-inspector.js';
import type { ElementHandleLike, ElementSnapshot } from '../../src/inspect/element-inspector.js';

const snapshot: ElementSnapshot = {
  tagName: 'input',
  attributes: { name: 'q', type: 'text' },
  innerText: '',
  xpath: '/html/body/form[1]/input[1]',
  parent: { tagName: 'form', id: null, className: 'search' },
  children: { count: 0, tags: [] },
};

function mockHandle(overrides: Partial<ElementHandleLike> = {}): ElementHandleLike {
  return {
    evaluate: vi.fn().mockResolvedValue(snapshot),
    textContent: vi.fn().mockResolvedValue(''),
    isVisible: vi.fn().mockResolvedValue(true),
    isEnabled: vi.fn().mockResolvedValue(true),
    boundingBox: vi.fn().mockResolvedValue({ x: 1, y: 2, width: 3, height: 4 }),
    ...overrides,
  };
}

describe('buildCssSelector', () => {
  it('prefers the id', () => {
    expect(buildCssSelector('div', { id: 'main', class: 'wrapper' })).toBe('#main');
  });

  it('uses the first class with the tag name', () => {
    expect(buildCssSelector('ul', { class: '  nav  item' })).toBe('ul.nav');
  });

  it('falls back to name, data-testid and aria-label', () => {
    expect(buildCssSelector('input', { name: 'q' })).toBe("input[name='q']");
    expect(buildCssSelector('div', { 'data-testid': 'card' })).toBe("div[data-testid='card']");
    expect(buildCssSelector('button', { 'aria-label': 'Close' })).toBe("button[aria-label='Close']");
  });

  it('returns null when no attribute identifies the element', () => {
    expect(buildCssSelector('span', { title: 'hint' })).toBeNull();
  });
});

describe('inspectElement', () => {
  it('combines the page snapshot with handle probes', async () => {
    const info = await inspectElement(mockHandle(), 7);

    expect(info).toEqual({
      index: 7,
      tagName: 'input',
      attributes: { name: 'q', type: 'text' },
      innerText: '',
      xpath: '/html/body/form[1]/input[1]',
      children: { count: 0, tags: [] },
      cssSelector: "input[name='q']",
      parent: { tagName: 'form', id: null, className: 'search' },
      textContent: '',
      isVisible: true,
      isEnabled: true,
      position: { x: 1, y: 2 },
      size: { width: 3, height: 4 },
    });
  });

  it('returns null when the element cannot be read', async () => {
    const handle = mockHandle({ evaluate: vi.fn().mockRejectedValue(new Error('Element is not attached')) });
    expect(await inspectElement(handle)).toBeNull();
  });

  it('leaves out probes that fail', async () => {
    const handle = mockHandle({
      boundingBox: vi.fn().mockRejectedValue(new Error('detached')),
      isEnabled: vi.fn().mockRejectedValue(new Error('detached')),
      textContent: vi.fn().mockResolvedValue(null),
    });
    const info = await inspectElement(handle);

    expect(info?.index).toBeUndefined();
    expect(info?.position).toBeUndefined();
    expect(info?.size).toBeUndefined();
    expect(info?.isEnabled).toBeUndefined();
    expect(info?.textContent).toBeUndefined();
    expect(info?.isVisible).toBe(true);
  });

  it('omits the css selector and parent when there are none', async () => {
    const handle = mockHandle({
      evaluate: vi.fn().mockResolvedValue({ ...snapshot, tagName: 'html', attributes: {}, parent: null }),
    });
    const info = await inspectElement(handle);

    expect(info?.cssSelector).toBeUndefined();
    expect(info?.parent).toBeUndefined();
  });
});
