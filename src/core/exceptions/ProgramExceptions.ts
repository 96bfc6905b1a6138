export class ProgramSyntaxError extends Error {
  readonly line: number;
  readonly source: string;

  constructor(reason: string, line: number, source: string) {
    super(`${reason} (line ${line}: '${source}')`);
    this.line = line;
    this.source = source;
    this.name = "ProgramSyntaxError";
  }
}
