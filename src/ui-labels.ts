/**
 * UI Label Table
 *
 * Maps each logical UI action to the visible label texts that can stand for
 * it (one per locale or app version). Automation code only ever asks for a
 * logical action; label drift is fixed in ui-labels.json or in the `labels`
 * key of the user config, never in code.
 */

import defaultLabels from './data/ui-labels.json';

export const UI_ACTIONS = [
  'library',
  'collections',
  'notebook',
  'emptyNotebook',
  'share',
  'exportConfirm',
  'cloudTarget',
  'uploadConfirm',
] as const;

export type UiAction = typeof UI_ACTIONS[number];

export type UiLabelTable = Readonly<Record<UiAction, readonly string[]>>;

export function isUiAction(value: string): value is UiAction {
  return UI_ACTIONS.some(action => action === value);
}

export const DEFAULT_UI_LABELS: UiLabelTable = defaultLabels;

/**
 * Overlay user overrides on the defaults. An override replaces the whole
 * label list for its action; empty lists are ignored.
 */
export function buildLabelTable(
  overrides: Partial<Record<UiAction, readonly string[]>> = {}
): UiLabelTable {
  const table: Record<UiAction, readonly string[]> = { ...DEFAULT_UI_LABELS };
  for (const action of UI_ACTIONS) {
    const labels = overrides[action];
    if (labels && labels.length > 0) {
      table[action] = [...labels];
    }
  }
  return table;
}

/**
 * Every label text in the table. Book discovery drops these from the
 * screen so app chrome is never mistaken for a title.
 */
export function allLabels(table: UiLabelTable): Set<string> {
  const labels = new Set<string>();
  for (const action of UI_ACTIONS) {
    for (const label of table[action]) {
      labels.add(label);
    }
  }
  return labels;
}
