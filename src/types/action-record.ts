export type ActionOutcome = 'pending' | 'success' | 'error';

export type FinalOutcome = Exclude<ActionOutcome, 'pending'>;

export interface ElementPosition {
  x: number;
  y: number;
}

export interface ElementSize {
  width: number;
  height: number;
}

export interface ParentElementInfo {
  tagName: string;
  id: string | null;
  className: string | null;
}

export interface ChildrenInfo {
  count: number;
  tags: string[];
}

export interface ElementInfo {
  index?: number;
  tagName: string;
  attributes: Record<string, string>;
  textContent?: string;
  innerText?: string;
  isVisible?: boolean;
  isEnabled?: boolean;
  position?: ElementPosition;
  size?: ElementSize;
  xpath?: string;
  cssSelector?: string;
  parent?: ParentElementInfo;
  children?: ChildrenInfo;
}

export interface PageChangeInfo {
  changed: boolean;
  previousUrl?: string;
  newUrl?: string;
  previousTitle?: string;
  newTitle?: string;
}

export type PropertyValue = string | number | boolean | null;

export interface PropertyChange {
  before: PropertyValue;
  after: PropertyValue;
}

export interface ActionRecord {
  sequenceIndex: number;
  actionType: string;
  targetSelector?: string;
  targetElementInfo?: ElementInfo;
  startedAt: string;
  completedAt?: string;
  durationMs?: number;
  outcome: ActionOutcome;
  errorDetail?: string;
  pageChangeInfo?: PageChangeInfo;
  result?: string;
  elementChanges?: Record<string, PropertyChange>;
  incomplete?: boolean;
}

export interface FinalizeDetails {
  errorDetail?: string;
  pageChangeInfo?: PageChangeInfo;
  result?: string;
  elementInfoAfter?: ElementInfo;
}
