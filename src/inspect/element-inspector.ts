import type { ChildrenInfo, ElementInfo, ParentElementInfo } from '../types/action-record.js';

/** The part of a Playwright `ElementHandle` the inspector needs. */
export interface ElementHandleLike {
  evaluate<R>(pageFunction: (el: Element) => R): Promise<R>;
  textContent(): Promise<string | null>;
  isVisible(): Promise<boolean>;
  isEnabled(): Promise<boolean>;
  boundingBox(): Promise<{ x: number; y: number; width: number; height: number } | null>;
}

export interface ElementSnapshot {
  tagName: string;
  attributes: Record<string, string>;
  innerText: string;
  xpath: string;
  parent: ParentElementInfo | null;
  children: ChildrenInfo;
}

/**
 * Runs inside the page. Must stay self-contained: Playwright serializes the
 * function source, so it cannot reference anything from this module.
 */
export function snapshotElement(el: Element): ElementSnapshot {
  const names = [
    'id',
    'class',
    'name',
    'type',
    'value',
    'href',
    'src',
    'placeholder',
    'aria-label',
    'role',
    'title',
    'alt',
    'data-testid',
  ];
  const attributes: Record<string, string> = {};
  for (const name of names) {
    const value = el.getAttribute(name);
    if (value) attributes[name] = value;
  }

  const xpathOf = (node: Element): string => {
    if (node.id) return `//*[@id="${node.id}"]`;
    if (node === node.ownerDocument.body) return '/html/body';
    const parent = node.parentElement;
    if (!parent) return `/${node.tagName.toLowerCase()}`;
    let position = 1;
    for (const sibling of Array.from(parent.children)) {
      if (sibling === node) break;
      if (sibling.tagName === node.tagName) position++;
    }
    return `${xpathOf(parent)}/${node.tagName.toLowerCase()}[${position}]`;
  };

  const parentEl = el.parentElement;
  const innerText = el instanceof HTMLElement ? el.innerText : (el.textContent ?? '');

  return {
    tagName: el.tagName.toLowerCase(),
    attributes,
    innerText,
    xpath: xpathOf(el),
    parent: parentEl
      ? {
          tagName: parentEl.tagName.toLowerCase(),
          id: parentEl.id || null,
          className: parentEl.getAttribute('class'),
        }
      : null,
    children: {
      count: el.children.length,
      tags: Array.from(el.children).map((child) => child.tagName.toLowerCase()),
    },
  };
}

export function buildCssSelector(tagName: string, attributes: Record<string, string>): string | null {
  if (attributes.id) return `#${attributes.id}`;

  const firstClass = attributes.class?.split(/\s+/).find((c) => c.length > 0);
  if (firstClass) return `${tagName}.${firstClass}`;

  for (const attr of ['name', 'data-testid', 'aria-label']) {
    const value = attributes[attr];
    if (value) return `${tagName}[${attr}='${value}']`;
  }

  return null;
}

/**
 * Collects element info for an action record. Returns null when the element
 * cannot be read at all; optional probes that fail are left out.
 */
export async function inspectElement(handle: ElementHandleLike, index?: number): Promise<ElementInfo | null> {
  let snapshot: ElementSnapshot;
  try {
    snapshot = await handle.evaluate(snapshotElement);
  } catch {
    return null;
  }

  const info: ElementInfo = {
    ...(index !== undefined ? { index } : {}),
    tagName: snapshot.tagName,
    attributes: snapshot.attributes,
    innerText: snapshot.innerText,
    xpath: snapshot.xpath,
    children: snapshot.children,
  };

  const cssSelector = buildCssSelector(snapshot.tagName, snapshot.attributes);
  if (cssSelector) info.cssSelector = cssSelector;
  if (snapshot.parent) info.parent = snapshot.parent;

  const textContent = await optional(() => handle.textContent());
  if (typeof textContent === 'string') info.textContent = textContent;

  const isVisible = await optional(() => handle.isVisible());
  if (isVisible !== undefined) info.isVisible = isVisible;

  const isEnabled = await optional(() => handle.isEnabled());
  if (isEnabled !== undefined) info.isEnabled = isEnabled;

  const box = await optional(() => handle.boundingBox());
  if (box) {
    info.position = { x: box.x, y: box.y };
    info.size = { width: box.width, height: box.height };
  }

  return info;
}

async function optional<T>(probe: () => Promise<T>): Promise<T | undefined> {
  try {
    return await probe();
  } catch {
    return undefined;
  }
}
