/**
 * In-memory editing of an LXC container config file
 *
 * Comments, blank lines and the order of untouched entries are kept as-is.
 */

const ENTRY_PATTERN = /^\s*([^#=\s][^=]*?)\s*=\s*(.*?)\s*$/;

interface ConfigLine {
  raw: string;
  key?: string;
  value?: string;
}

function parseLine(raw: string): ConfigLine {
  const match = raw.match(ENTRY_PATTERN);
  if (!match) return { raw };
  return { raw, key: match[1], value: match[2] };
}

function formatEntry(key: string, value: string): ConfigLine {
  return { raw: `${key} = ${value}`, key, value };
}

export class LxcConfig {
  private lines: ConfigLine[];

  private constructor(lines: ConfigLine[]) {
    this.lines = lines;
  }

  static parse(text: string): LxcConfig {
    const rawLines = text.split(/\r?\n/);
    if (rawLines.length > 0 && rawLines[rawLines.length - 1] === '') {
      rawLines.pop();
    }
    return new LxcConfig(rawLines.map(parseLine));
  }

  static empty(): LxcConfig {
    return new LxcConfig([]);
  }

  /**
   * All values of a key, in file order
   */
  get(key: string): string[] {
    return this.lines
      .filter(line => line.key === key && line.value !== undefined)
      .map(line => line.value ?? '');
  }

  /**
   * Remove every entry of a key
   */
  clear(key: string): void {
    this.lines = this.lines.filter(line => line.key !== key);
  }

  append(key: string, value: string): void {
    this.lines.push(formatEntry(key, value));
  }

  /**
   * Replace the first entry of a key and drop the others, or append it
   */
  set(key: string, value: string): void {
    const index = this.lines.findIndex(line => line.key === key);
    if (index < 0) {
      this.append(key, value);
      return;
    }
    const kept = this.lines.filter((line, i) => i === index || line.key !== key);
    const position = kept.findIndex(line => line.key === key);
    kept[position] = formatEntry(key, value);
    this.lines = kept;
  }

  toString(): string {
    if (this.lines.length === 0) return '';
    return this.lines.map(line => line.raw).join('\n') + '\n';
  }
}
