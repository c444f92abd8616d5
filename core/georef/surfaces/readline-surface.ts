import { createInterface, Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { InputEvent, MeasurementSurface, SurfaceAnnotation, TextInput } from '../surface';

const CLICK_PATTERN = /^click\s+(\d+(?:\.\d+)?)[\s,]+(\d+(?:\.\d+)?)$/i;
const KEY_PATTERN = /^key\s+(\S)$/i;

/**
 * Parse one line of terminal input into an event. Returns null when the
 * line is not a command.
 *
 *   click <x> <y> | confirm | (empty line) | cancel | esc | key <k> | <k>
 */
export function parseCommand(line: string): InputEvent | null {
  const text = line.trim();
  const lower = text.toLowerCase();

  if (text === '' || lower === 'confirm' || lower === 'enter' || lower === 'space') {
    return { type: 'confirm' };
  }
  if (lower === 'cancel' || lower === 'esc') {
    return { type: 'cancel' };
  }

  const clickMatch = CLICK_PATTERN.exec(text);
  if (clickMatch) {
    return { type: 'click', x: Number(clickMatch[1]), y: Number(clickMatch[2]) };
  }

  const keyMatch = KEY_PATTERN.exec(text);
  if (keyMatch) {
    return { type: 'key', key: keyMatch[1] };
  }
  if (text.length === 1) {
    return { type: 'key', key: text };
  }
  return null;
}

export function describeAnnotation(annotation: SurfaceAnnotation): string {
  switch (annotation.type) {
    case 'point':
      return `[${annotation.role}] point at (${annotation.point.x}, ${annotation.point.y})`;
    case 'line':
      return `[scale] line (${annotation.from.x}, ${annotation.from.y}) -> (${annotation.to.x}, ${annotation.to.y})`;
    case 'arrow':
      return `[north] arrow (${annotation.base.x}, ${annotation.base.y}) -> (${annotation.tip.x}, ${annotation.tip.y})`;
    case 'clear':
      return '[overlay] cleared';
  }
}

/**
 * Line-oriented terminal surface. Pointer clicks are typed as commands;
 * closing the input stream cancels.
 */
export class ReadlineSurface implements MeasurementSurface {
  private rl: Interface | null = null;
  private readonly lines: string[] = [];
  private readonly waiters: Array<(line: string | null) => void> = [];
  private closed = false;

  constructor(
    private readonly input: Readable,
    private readonly output: Writable
  ) {}

  async acquire(): Promise<void> {
    if (this.rl) return;
    this.closed = false;
    const rl = createInterface({ input: this.input, terminal: false });
    rl.on('line', line => {
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(line);
      } else {
        this.lines.push(line);
      }
    });
    rl.on('close', () => {
      this.closed = true;
      this.waiters.splice(0).forEach(waiter => waiter(null));
    });
    this.rl = rl;
    this.write('Press ESC (type "esc") at any time to cancel.');
  }

  async release(): Promise<void> {
    const rl = this.rl;
    this.rl = null;
    rl?.close();
  }

  async nextEvent(): Promise<InputEvent> {
    for (;;) {
      const line = await this.readLine();
      if (line === null) {
        return { type: 'cancel' };
      }
      const event = parseCommand(line);
      if (event) {
        return event;
      }
      this.write(`Unrecognized input: "${line.trim()}". Use click <x> <y>, confirm, key <k> or esc.`);
    }
  }

  async promptText(message: string): Promise<TextInput> {
    this.output.write(message);
    const line = await this.readLine();
    if (line === null) {
      return { kind: 'cancel' };
    }
    const lower = line.trim().toLowerCase();
    if (lower === 'esc' || lower === 'cancel') {
      return { kind: 'cancel' };
    }
    return { kind: 'text', value: line };
  }

  async notify(message: string): Promise<void> {
    this.write(message);
  }

  async annotate(annotation: SurfaceAnnotation): Promise<void> {
    this.write(describeAnnotation(annotation));
  }

  private write(message: string): void {
    this.output.write(`${message}\n`);
  }

  private readLine(): Promise<string | null> {
    const buffered = this.lines.shift();
    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }
    if (this.closed || !this.rl) {
      return Promise.resolve(null);
    }
    return new Promise(resolve => {
      this.waiters.push(resolve);
    });
  }
}
