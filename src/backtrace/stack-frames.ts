export interface StackFrame {
  fn?: string;
  location?: string;
}

const FRAME_PATTERN = /^\s*at (?:(.+?) \((.+)\)|(.+))$/;

/**
 * Parse the frame lines of a V8 stack string. The header line and anything
 * that does not look like a frame are skipped.
 */
export function parseStackFrames(stack: string): StackFrame[] {
  const frames: StackFrame[] = [];

  for (const line of stack.split('\n')) {
    const match = FRAME_PATTERN.exec(line);
    if (!match) {
      continue;
    }

    const [, fn, location, bare] = match;
    if (fn !== undefined) {
      frames.push({ fn, location });
    } else {
      frames.push({ location: bare });
    }
  }

  return frames;
}

export function formatStackFrame(frame: StackFrame, index: number): string {
  const header = `${String(index).padStart(4)}: ${frame.fn ?? '<unknown>'}`;
  return frame.location ? `${header}\n             at ${frame.location}` : header;
}
