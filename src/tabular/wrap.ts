/**
 * Greedy word wrap for the MESSAGE column.
 * Breaks at whitespace; whitespace runs collapse to a single space.
 * A word wider than the column is cut: its first piece fills what is left of
 * the current line, the rest continues in `width`-sized chunks.
 */
export function wrapText(text: string, width: number): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  if (words.length === 0) return [''];

  const lines: string[] = [];
  let current = '';
  for (const word of words) {
    if (word.length > width) {
      let rest = word;
      if (current !== '') {
        const room = width - current.length - 1;
        if (room > 0) {
          current += ' ' + rest.slice(0, room);
          rest = rest.slice(room);
        }
        lines.push(current);
      }
      while (rest.length > width) {
        lines.push(rest.slice(0, width));
        rest = rest.slice(width);
      }
      current = rest;
    } else if (current === '') {
      current = word;
    } else if (current.length + 1 + word.length <= width) {
      current += ' ' + word;
    } else {
      lines.push(current);
      current = word;
    }
  }
  lines.push(current);
  return lines;
}
