/**
 * A run of text with its position on the page (PDF user space, origin bottom-left)
 */
export interface PositionedText {
  text: string;
  x: number;
  y: number;
}

/** Items whose baselines differ by no more than this share a line */
export const LINE_TOLERANCE = 2;

/**
 * Rebuild reading order for one page: lines top-to-bottom, text left-to-right
 * within a line. Every line ends with a newline.
 */
export function layoutPageText(items: PositionedText[], tolerance: number = LINE_TOLERANCE): string {
  const visible = items
    .filter((item) => item.text.trim() !== '')
    .sort((a, b) => b.y - a.y || a.x - b.x);

  const lines: PositionedText[][] = [];
  let lineY = Number.NaN;
  for (const item of visible) {
    const current = lines[lines.length - 1];
    if (current && Math.abs(item.y - lineY) <= tolerance) {
      current.push(item);
    } else {
      lines.push([item]);
      lineY = item.y;
    }
  }

  return lines
    .map((line) =>
      line
        .sort((a, b) => a.x - b.x)
        .map((item) => item.text)
        .join(' ')
        .replace(/\s+/g, ' ')
        .trim()
    )
    .map((text) => `${text}\n`)
    .join('');
}
