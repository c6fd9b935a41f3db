import type { FieldExtractionWarning } from "../../core/entities/appError";
import type { MarkupElement } from "../../core/entities/markup";

/**
 * Every element named `name` below `root`, in document order (root excluded).
 */
export const findDescendants = (
  root: MarkupElement,
  name: string,
): MarkupElement[] => {
  const matches: MarkupElement[] = [];
  const visit = (element: MarkupElement): void => {
    for (const child of element.children) {
      if (child.name === name) {
        matches.push(child);
      }
      visit(child);
    }
  };

  visit(root);
  return matches;
};

export const findFirstDescendant = (
  root: MarkupElement,
  name: string,
): MarkupElement | undefined => findDescendants(root, name)[0];

export const findChild = (
  element: MarkupElement,
  name: string,
): MarkupElement | undefined =>
  element.children.find((child) => child.name === name);

/**
 * Text of the first `leaf` child under any `ancestor` element, skipping empty ones.
 */
export const findLeafText = (
  root: MarkupElement,
  ancestor: string,
  leaf: string,
): string | undefined => {
  for (const container of findDescendants(root, ancestor)) {
    for (const child of container.children) {
      if (child.name === leaf && child.text.length > 0) {
        return child.text;
      }
    }
  }

  return undefined;
};

const integerPattern = /^[+-]?\d+$/;

/**
 * Reads numeric leaves with a zero default and records every value that was present but unreadable.
 */
export class NumericFieldReader {
  private readonly collected: FieldExtractionWarning[] = [];

  get warnings(): FieldExtractionWarning[] {
    return [...this.collected];
  }

  readInt(element: MarkupElement, tag: string, field: string): number {
    return this.read(element, tag, field, (raw) =>
      integerPattern.test(raw) ? Number.parseInt(raw, 10) : undefined,
    );
  }

  readFloat(element: MarkupElement, tag: string, field: string): number {
    return this.read(element, tag, field, (raw) => {
      const value = Number(raw);
      return Number.isFinite(value) ? value : undefined;
    });
  }

  private read(
    element: MarkupElement,
    tag: string,
    field: string,
    convert: (raw: string) => number | undefined,
  ): number {
    const raw = findChild(element, tag)?.text.trim() ?? "";
    if (raw.length === 0) {
      return 0;
    }

    const value = convert(raw);
    if (value === undefined) {
      this.collected.push({ field, rawValue: raw });
      return 0;
    }

    return value;
  }
}
