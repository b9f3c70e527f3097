/**
 * Line sink for generated assembly.
 *
 * Instructions and data definitions are indented two spaces; labels and section directives are not.
 */
export class AsmWriter {
  private readonly out: string[] = [];

  line(text = ''): void {
    this.out.push(text);
  }

  instr(text: string): void {
    this.out.push(`  ${text}`);
  }

  label(name: string): void {
    this.out.push(`${name}:`);
  }

  get lines(): readonly string[] {
    return this.out;
  }
}
