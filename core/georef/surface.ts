import type { PixelPoint } from '@/types/georef';

/**
 * Pointer and keyboard events delivered by a measurement surface
 */
export type InputEvent =
  | { type: 'click'; x: number; y: number }
  | { type: 'confirm' }
  | { type: 'cancel' }
  | { type: 'key'; key: string };

export type TextInput =
  | { kind: 'text'; value: string }
  | { kind: 'cancel' };

/**
 * Overlay drawn on top of the plan while measuring
 */
export type SurfaceAnnotation =
  | { type: 'point'; point: PixelPoint; role: 'reference' | 'scale' | 'north' }
  | { type: 'line'; from: PixelPoint; to: PixelPoint }
  | { type: 'arrow'; base: PixelPoint; tip: PixelPoint }
  | { type: 'clear' };

/**
 * The display and input device a measurement session owns for its lifetime
 */
export interface MeasurementSurface {
  acquire(): Promise<void>;
  release(): Promise<void>;
  /** Wait for the next pointer or key event */
  nextEvent(): Promise<InputEvent>;
  /** Ask for a line of text */
  promptText(message: string): Promise<TextInput>;
  /** Show an instruction or a re-prompt message */
  notify(message: string): Promise<void>;
  annotate(annotation: SurfaceAnnotation): Promise<void>;
}
