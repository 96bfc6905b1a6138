export type LineKind = "label" | "instruction";

export interface SourceLine {
  kind: LineKind;
  /** 1-based line number in the source text. */
  line: number;
  /** Comment-stripped, trimmed text. */
  text: string;
  /** Mnemonic followed by operands; commas are treated as whitespace. */
  tokens: string[];
}

const COMMENT_MARKERS = ["#", ";"];

export class Lexer {
  tokenize(source: string): SourceLine[] {
    const lines: SourceLine[] = [];

    source.split(/\r?\n/).forEach((raw, index) => {
      const text = this.stripComment(raw).trim();
      if (!text) return;

      if (text.endsWith(":")) {
        lines.push({ kind: "label", line: index + 1, text, tokens: [text.slice(0, -1).trim()] });
        return;
      }

      lines.push({
        kind: "instruction",
        line: index + 1,
        text,
        tokens: text.replace(/,/g, " ").split(/\s+/).filter((token) => token.length > 0),
      });
    });

    return lines;
  }

  private stripComment(text: string): string {
    let end = text.length;
    for (const marker of COMMENT_MARKERS) {
      const index = text.indexOf(marker);
      if (index !== -1 && index < end) {
        end = index;
      }
    }
    return text.slice(0, end);
  }
}
