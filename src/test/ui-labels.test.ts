import { describe, it, expect } from 'vitest';
import { DEFAULT_UI_LABELS, UI_ACTIONS, allLabels, buildLabelTable, isUiAction } from '../ui-labels';
import { firstMatch, matchesLabel } from '../ui-driver';
import type { UiElement } from '../ui-driver';

describe('UI label table', () => {
  it('should have labels for every action', () => {
    for (const action of UI_ACTIONS) {
      expect(DEFAULT_UI_LABELS[action].length).toBeGreaterThan(0);
    }
  });

  it('should replace an action list with an override and ignore empty ones', () => {
    const table = buildLabelTable({ cloudTarget: ['Google Drive'], share: [] });

    expect(table.cloudTarget).toEqual(['Google Drive']);
    expect(table.share).toEqual(DEFAULT_UI_LABELS.share);
  });

  it('should collect every label for chrome filtering', () => {
    const labels = allLabels(buildLabelTable());

    expect(labels.has('OneDrive')).toBe(true);
    expect(labels.has('Library')).toBe(true);
  });

  it('should recognise action names', () => {
    expect(isUiAction('notebook')).toBe(true);
    expect(isUiAction('settings')).toBe(false);
  });
});

describe('label matching', () => {
  function element(text: string, contentDesc = ''): UiElement {
    return {
      text,
      contentDesc,
      resourceId: '',
      className: 'android.widget.ImageButton',
      bounds: { left: 0, top: 0, right: 10, bottom: 10 },
      clickable: true,
    };
  }

  it('should match text or content description exactly', () => {
    expect(matchesLabel(element('', 'Library'), 'Library')).toBe(true);
    expect(matchesLabel(element('', 'Library'), 'library')).toBe(false);
  });

  it('should prefer the earliest label in the list over screen order', () => {
    const screen = [element('Share'), element('Export notebook')];

    expect(firstMatch(screen, ['Export notebook', 'Share'])?.text).toBe('Export notebook');
    expect(firstMatch(screen, ['Teilen'])).toBeNull();
  });
});
