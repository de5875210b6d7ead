/**
 * Runs inside the page (Playwright serializes it for `evaluate`), so it must
 * stay self-contained: no imports, no helpers from this module's scope.
 *
 * Looks for a `for=` label, then a wrapping label, then a label immediately
 * preceding the control.
 */
export function associatedLabelText(element: Element): string | null {
  const textOf = (node: Element) => (node.textContent ?? '').replace(/\s+/g, ' ').trim();

  const id = element.getAttribute('id');
  if (id) {
    const labels = Array.from(element.ownerDocument.querySelectorAll('label'));
    const byFor = labels.find((label) => label.getAttribute('for') === id);
    if (byFor) return textOf(byFor);
  }

  const wrapping = element.closest('label');
  if (wrapping) return textOf(wrapping);

  const previous = element.previousElementSibling;
  if (previous && previous.tagName.toLowerCase() === 'label') return textOf(previous);

  return null;
}
