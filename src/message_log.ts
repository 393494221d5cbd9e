type Entry = { level: number; text: string };

export class MessageLog {
  private readonly entries: Entry[] = [];

  constructor(private readonly echo = false) {}

  post(level: number, text: string): void {
    this.entries.push({ level, text });
    if (this.echo) console.error(`${"  ".repeat(level)}${text}`);
  }

  lines(): string[] {
    return this.entries.map((e) => `${"  ".repeat(e.level)}${e.text}`);
  }

  has(fragment: string): boolean {
    return this.entries.some((e) => e.text.includes(fragment));
  }

  errors(): string[] {
    return this.entries.filter((e) => e.text.startsWith("Error")).map((e) => e.text);
  }

  get size(): number {
    return this.entries.length;
  }
}
