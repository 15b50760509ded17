/**
 * Element Classifier
 *
 * Decides, before anything is drawn, whether a slide is a single text flow
 * or a split slide whose body is given to tables and charts.
 */

import { LayoutMode } from '../models/deck.model';
import { ContentItem, isVisualItem, TextFlowItem, VisualItem } from '../models/topic.model';

export interface ContentPartition {
  mode: LayoutMode;
  /** Tables and charts, in content order */
  visuals: VisualItem[];
  /** Text flow items, in content order */
  text: TextFlowItem[];
}

/**
 * `split` iff at least one item is a table or a chart
 */
export function classifySlide(items: readonly ContentItem[]): LayoutMode {
  return items.some(isVisualItem) ? 'split' : 'text-only';
}

/**
 * Classify and separate a slide's items.
 * On a split slide the `text` entries are the ones that will not be drawn.
 */
export function partitionContent(items: readonly ContentItem[]): ContentPartition {
  const visuals: VisualItem[] = [];
  const text: TextFlowItem[] = [];

  for (const item of items) {
    if (isVisualItem(item)) {
      visuals.push(item);
    } else {
      text.push(item);
    }
  }

  return {
    mode: visuals.length > 0 ? 'split' : 'text-only',
    visuals,
    text,
  };
}
