import { InputExhaustedError } from '@/types/errors';
import type { InputEvent, MeasurementSurface, SurfaceAnnotation, TextInput } from '../surface';

export interface ScriptedSurfaceOptions {
  events?: InputEvent[];
  /** Answers to text prompts; null answers the prompt with a cancel */
  answers?: Array<string | null>;
}

/**
 * Headless surface replaying a fixed sequence of events and text answers
 */
export class ScriptedSurface implements MeasurementSurface {
  private readonly events: InputEvent[];
  private readonly answers: Array<string | null>;

  public readonly notifications: string[] = [];
  public readonly prompts: string[] = [];
  public readonly annotations: SurfaceAnnotation[] = [];
  public acquireCount = 0;
  public releaseCount = 0;

  constructor(options: ScriptedSurfaceOptions = {}) {
    this.events = [...(options.events ?? [])];
    this.answers = [...(options.answers ?? [])];
  }

  get isHeld(): boolean {
    return this.acquireCount > this.releaseCount;
  }

  get remainingEvents(): number {
    return this.events.length;
  }

  get remainingAnswers(): number {
    return this.answers.length;
  }

  async acquire(): Promise<void> {
    this.acquireCount += 1;
  }

  async release(): Promise<void> {
    this.releaseCount += 1;
  }

  async nextEvent(): Promise<InputEvent> {
    const event = this.events.shift();
    if (!event) {
      throw new InputExhaustedError('No scripted input events left');
    }
    return event;
  }

  async promptText(message: string): Promise<TextInput> {
    this.prompts.push(message);
    if (this.answers.length === 0) {
      throw new InputExhaustedError('No scripted text answers left', { prompt: message });
    }
    const answer = this.answers.shift();
    return answer === null || answer === undefined ? { kind: 'cancel' } : { kind: 'text', value: answer };
  }

  async notify(message: string): Promise<void> {
    this.notifications.push(message);
  }

  async annotate(annotation: SurfaceAnnotation): Promise<void> {
    this.annotations.push(annotation);
  }
}

/** Shorthand event builders for scripts */
export const click = (x: number, y: number): InputEvent => ({ type: 'click', x, y });
export const confirm = (): InputEvent => ({ type: 'confirm' });
export const cancel = (): InputEvent => ({ type: 'cancel' });
export const key = (k: string): InputEvent => ({ type: 'key', key: k });
