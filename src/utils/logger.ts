import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

export interface Logger {
  info(message: string): Promise<void>;
  warn(message: string): Promise<void>;
  error(message: string): Promise<void>;
}

export interface RunLoggerOptions {
  label?: string;
  echo?: boolean;
}

function nowIso(): string {
  return new Date().toISOString();
}

export function dailyLogPath(logDir: string, date = new Date()): string {
  return join(logDir, `feed_run_${date.toISOString().slice(0, 10)}.log`);
}

export class RunLogger implements Logger {
  private readonly runLabel: string;
  private readonly echo: boolean;

  constructor(
    private readonly filePath: string,
    options: RunLoggerOptions = {},
  ) {
    this.runLabel = options.label ?? 'Feed run';
    this.echo = options.echo ?? false;
  }

  async init(): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, '', { encoding: 'utf8', flag: 'a' });
    await this.write(`=== ${this.runLabel} started ${nowIso()} ===`);
  }

  async info(message: string): Promise<void> {
    await this.write(`[INFO] ${message}`);
  }

  async warn(message: string): Promise<void> {
    await this.write(`[WARN] ${message}`);
  }

  async error(message: string): Promise<void> {
    await this.write(`[ERROR] ${message}`);
  }

  async close(): Promise<void> {
    await this.write(`=== ${this.runLabel} finished ${nowIso()} ===`);
  }

  private async write(message: string): Promise<void> {
    const line = `${nowIso()} ${message}`;
    if (this.echo) {
      console.log(line);
    }
    await appendFile(this.filePath, `${line}\n`, 'utf8');
  }
}
