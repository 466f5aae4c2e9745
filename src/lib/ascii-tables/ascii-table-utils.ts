import stringWidth from 'string-width';

const graphemeSegmenter = new Intl.Segmenter(undefined, {
  granularity: 'grapheme',
});

export class ASCIITableUtils {
  /**
   * A full-width separator line: `+=====+` or `+-----+`
   */
  public static createSeparator(
    columnWidths: number[],
    character: string = '=',
  ): string {
    const totalWidth =
      columnWidths.reduce((sum, width) => sum + width + 3, 0) - 1;

    return `+${character.repeat(totalWidth)}+`;
  }

  /**
   * Pads `text` on the right to the given display width
   */
  public static padDisplayRight(text: string, width: number): string {
    return text + ' '.repeat(Math.max(width - stringWidth(text), 0));
  }

  /**
   * Word-wraps text to lines no wider than `maxLength` display columns.
   * Words longer than a line are split on grapheme boundaries.
   */
  public static wrapText(text: string, maxLength: number): string[] {
    const lines: string[] = [];
    let currentLine = '';

    for (const word of text.split(' ')) {
      const candidateWidth =
        stringWidth(currentLine) + stringWidth(word) + (currentLine ? 1 : 0);

      if (candidateWidth <= maxLength) {
        currentLine += (currentLine ? ' ' : '') + word;
        continue;
      }

      if (currentLine) {
        lines.push(currentLine);
      }

      if (stringWidth(word) <= maxLength) {
        currentLine = word;
      } else {
        const subWords = ASCIITableUtils.splitWord(word, maxLength);
        lines.push(...subWords.slice(0, -1));
        currentLine = subWords[subWords.length - 1] ?? '';
      }
    }

    if (currentLine || lines.length === 0) {
      lines.push(currentLine);
    }

    return lines;
  }

  public static splitWord(word: string, maxLength: number): string[] {
    const subWords: string[] = [];
    let currentSubWord = '';

    for (const { segment } of graphemeSegmenter.segment(word)) {
      if (stringWidth(currentSubWord + segment) <= maxLength) {
        currentSubWord += segment;
      } else {
        subWords.push(currentSubWord);
        currentSubWord = segment;
      }
    }

    if (currentSubWord) {
      subWords.push(currentSubWord);
    }

    return subWords;
  }
}
