/**
 * UI Inspector
 *
 * Lists what is on the device screen right now, so the label table can be
 * adjusted for another app version or language.
 */

import type { UiElement } from './ui-driver';

export interface InspectOptions {
  /** Case-insensitive substring of text, content description or resource id */
  find?: string;
  clickableOnly?: boolean;
}

export function selectElements(elements: readonly UiElement[], options: InspectOptions = {}): UiElement[] {
  const needle = options.find?.toLowerCase();
  return elements.filter(el => {
    if (options.clickableOnly && !el.clickable) return false;
    if (!needle) return true;
    return [el.text, el.contentDesc, el.resourceId].some(value => value.toLowerCase().includes(needle));
  });
}

/**
 * One line per element: `*` marks clickable ones.
 */
export function formatElement(el: UiElement): string {
  const { left, top, right, bottom } = el.bounds;
  return [
    el.clickable ? '*' : ' ',
    `text=${JSON.stringify(el.text)}`,
    `desc=${JSON.stringify(el.contentDesc)}`,
    `id=${el.resourceId || '-'}`,
    `class=${el.className || '-'}`,
    `bounds=[${left},${top}][${right},${bottom}]`,
  ].join(' ');
}

export function formatInspection(elements: readonly UiElement[], options: InspectOptions = {}): string {
  const shown = selectElements(elements, options);
  const clickable = elements.filter(el => el.clickable).length;
  const header = options.find || options.clickableOnly
    ? `${shown.length} of ${elements.length} elements shown (${clickable} clickable)`
    : `${elements.length} elements (${clickable} clickable)`;
  return [header, ...shown.map(formatElement)].join('\n');
}
