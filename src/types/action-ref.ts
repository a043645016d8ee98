export type ActionType =
  | 'goto'
  | 'go_back'
  | 'click'
  | 'fill'
  | 'type'
  | 'press'
  | 'scroll'
  | 'extract_content';

export interface ActionRef {
  type: ActionType;
  selector?: string;
  value?: string;
  url?: string;
  index?: number;
}
