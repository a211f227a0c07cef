// ─── Token types ───

export enum TokenKind {
  Word,
  Pipe,           // |
  Semi,           // ;
  Amp,            // &
  RedirectOut,    // >
  Newline,        // \n
  EOF,
}

export interface Token {
  kind: TokenKind;
  /** For words: the text with quotes removed and escapes applied */
  value: string;
  pos: number;
  /** Source span, used to rebuild chain text */
  end: number;
}

// ─── Parsed line ───

/** One pipeline stage. `next` is the stage this one pipes into. */
export interface ParsedCommand {
  readonly name: string;
  readonly args: readonly string[];
  readonly next: ParsedCommand | null;
}

/** One `;`-delimited sequence of piped stages. */
export interface ParsedChain {
  readonly head: ParsedCommand;
  readonly background: boolean;
  /** Source text of the chain, used as the job label for background chains */
  readonly text: string;
}

export interface ParsedLine {
  /** Target of a trailing `> file`, applied to the combined output of all chains */
  readonly redirect: string | null;
  readonly chains: readonly ParsedChain[];
}
