import type { ActionRef } from '../types/action-ref.js';
import type { ElementHandleLike } from '../inspect/element-inspector.js';
import type { PageLike } from '../inspect/page-state.js';
import { UnsupportedActionError } from '../recorder/errors.js';
import type { ActionRunner } from '../runner/action-runner.js';

export interface PlaywrightPage extends PageLike {
  goto(url: string, options?: { waitUntil?: 'load' | 'domcontentloaded' | 'networkidle' | 'commit' }): Promise<unknown>;
  goBack(): Promise<unknown>;
  locator(selector: string): PlaywrightLocator;
  getByTestId(testId: string): PlaywrightLocator;
  getByRole(role: string, options?: { name?: string }): PlaywrightLocator;
  keyboard: { press(key: string): Promise<void> };
  mouse: { wheel(deltaX: number, deltaY: number): Promise<void> };
}

export interface PlaywrightLocator {
  click(): Promise<void>;
  fill(value: string): Promise<void>;
  pressSequentially(text: string): Promise<void>;
  press(key: string): Promise<void>;
  innerText(): Promise<string>;
  first(): PlaywrightLocator;
  nth(index: number): PlaywrightLocator;
  elementHandle(options?: { timeout?: number }): Promise<ElementHandleLike | null>;
}

const ELEMENT_LOOKUP_TIMEOUT_MS = 1000;
const DEFAULT_SCROLL_PX = 500;

function extractTestId(selector: string): string | null {
  const match = selector.match(/\[data-testid=["']([^"']+)["']\]/);
  return match ? match[1] : null;
}

function extractRole(selector: string): { role: string; name?: string } | null {
  const match = selector.match(/^role=(\w+)\[name=["']([^"']+)["']\]$/);
  if (match) return { role: match[1], name: match[2] };
  const simpleMatch = selector.match(/^role=(\w+)$/);
  if (simpleMatch) return { role: simpleMatch[1] };
  return null;
}

export function getLocator(page: PlaywrightPage, selector: string, index?: number): PlaywrightLocator {
  let locator: PlaywrightLocator;
  const testId = extractTestId(selector);
  const role = testId ? null : extractRole(selector);
  if (testId) {
    locator = page.getByTestId(testId);
  } else if (role) {
    locator = page.getByRole(role.role, role.name ? { name: role.name } : undefined);
  } else {
    locator = page.locator(selector);
  }
  return index !== undefined ? locator.nth(index) : locator.first();
}

export function describeTarget(action: ActionRef): string | undefined {
  if (action.selector === undefined) return action.url;
  return action.index !== undefined ? `${action.selector} >> nth=${action.index}` : action.selector;
}

/**
 * Executes explicit action references against a Playwright page. Every action
 * goes through the runner, so each one leaves a before/after record.
 */
export class PlaywrightActionEngine {
  constructor(
    private page: PlaywrightPage,
    private runner: ActionRunner,
  ) {}

  async execute(action: ActionRef): Promise<string | undefined> {
    const locator = action.selector ? getLocator(this.page, action.selector, action.index) : null;

    return this.runner.run(
      {
        actionType: action.type,
        targetSelector: describeTarget(action),
        elementIndex: action.index,
        resolveElement: locator ? () => locator.elementHandle({ timeout: ELEMENT_LOOKUP_TIMEOUT_MS }) : undefined,
      },
      () => this.perform(action, locator),
    );
  }

  private async perform(action: ActionRef, locator: PlaywrightLocator | null): Promise<string | void> {
    switch (action.type) {
      case 'goto': {
        if (!action.url) throw new Error('Action "goto" requires a url');
        await this.page.goto(action.url, { waitUntil: 'domcontentloaded' });
        return;
      }
      case 'go_back':
        await this.page.goBack();
        return;
      case 'click':
        await this.element(action, locator).click();
        return;
      case 'fill':
        await this.element(action, locator).fill(action.value ?? '');
        return;
      case 'type':
        await this.element(action, locator).pressSequentially(action.value ?? '');
        return;
      case 'press': {
        const key = action.value ?? 'Enter';
        if (locator) await locator.press(key);
        else await this.page.keyboard.press(key);
        return;
      }
      case 'scroll': {
        const amount = action.value !== undefined ? Number.parseInt(action.value, 10) : DEFAULT_SCROLL_PX;
        await this.page.mouse.wheel(0, Number.isNaN(amount) ? DEFAULT_SCROLL_PX : amount);
        return;
      }
      case 'extract_content':
        return (locator ?? this.page.locator('body')).innerText();
      default:
        throw new UnsupportedActionError(String(action.type));
    }
  }

  private element(action: ActionRef, locator: PlaywrightLocator | null): PlaywrightLocator {
    if (!locator) throw new Error(`Action "${action.type}" requires a selector`);
    return locator;
  }
}
