export interface TextSpan {
  start: number;
  end: number;
}

export function splitIntoWords(text: string): string[] {
  return text.replace(/\s+/g, " ").trim().split(" ").filter(Boolean);
}

export function countWords(text: string): number {
  return splitIntoWords(text).length;
}

/** Offsets of every whitespace-delimited word inside `span` of `text`. */
export function wordSpans(text: string, span: TextSpan): TextSpan[] {
  const spans: TextSpan[] = [];
  const pattern = /\S+/g;
  const slice = text.slice(span.start, span.end);
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(slice)) !== null) {
    spans.push({
      start: span.start + match.index,
      end: span.start + match.index + match[0].length,
    });
  }
  return spans;
}
