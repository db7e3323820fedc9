/** Cut `text` to at most `maxChars` UTF-16 code units. No trimming. */
export function clampText(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return text.slice(0, maxChars);
}
