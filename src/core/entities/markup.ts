/**
 * Element-only view of a parsed markup document; text is the concatenated direct text content.
 */
export type MarkupElement = {
  name: string;
  text: string;
  children: MarkupElement[];
};
