/**
 * Environment-independent view of a located element.
 */

import type { ElementHandle, ElementSnapshot } from './types.js';

export async function snapshotElement(handle: ElementHandle): Promise<ElementSnapshot> {
  const attr = async (name: string) => (await handle.getAttribute(name)) ?? '';

  return {
    tagName: (await handle.tagName()).toLowerCase(),
    type: (await attr('type')).toLowerCase(),
    required: (await handle.getAttribute('required')) !== null,
    placeholder: await attr('placeholder'),
    labelText: (await handle.labelText()) ?? '',
    ariaRole: await attr('role'),
    ariaLabel: await attr('aria-label'),
    title: await attr('title'),
    name: await attr('name'),
    id: await attr('id'),
    className: await attr('class'),
    visibleText: (await handle.text()).trim(),
    displayed: await handle.isDisplayed(),
  };
}

/**
 * Input type of a form control. A bare `<input>` is a text field; other
 * controls without a type attribute report their tag, and anything else
 * is unspecified ('').
 */
export function fieldType(snapshot: ElementSnapshot): string {
  if (snapshot.type) return snapshot.type;
  switch (snapshot.tagName) {
    case 'input':
      return 'text';
    case 'select':
    case 'textarea':
      return snapshot.tagName;
    default:
      return '';
  }
}

/** First non-empty of label, placeholder, aria-label and title. */
export function fieldText(snapshot: ElementSnapshot): string {
  const candidates = [snapshot.labelText, snapshot.placeholder, snapshot.ariaLabel, snapshot.title];
  return candidates.map((text) => text.trim()).find((text) => text.length > 0) ?? '';
}

export function actionType(snapshot: ElementSnapshot): string {
  if (snapshot.type === 'submit') return 'submit';
  if (snapshot.tagName === 'button') return 'button';
  if (snapshot.tagName === 'input') return snapshot.type || 'text';
  if (snapshot.tagName === 'a') return 'link';
  return 'unknown';
}
