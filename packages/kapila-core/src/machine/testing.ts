/**
 * Shared helpers for the machine tests
 */

import { RuntimeFault } from './errors.js';
import { Session, type SessionOptions } from './session.js';

/**
 * The fault `action` raised, or null if it completed
 */
export function faultOf(action: () => unknown): RuntimeFault | null {
  try {
    action();
  } catch (error) {
    if (error instanceof RuntimeFault) {
      return error;
    }
    throw error;
  }
  return null;
}

export interface CapturedSession {
  session: Session;
  output: () => string;
}

/**
 * A session whose printed output is collected in memory
 */
export function captureSession(options: SessionOptions = {}): CapturedSession {
  const chunks: string[] = [];
  const session = new Session({
    ...options,
    output: {
      write(chunk: string): void {
        chunks.push(chunk);
      },
    },
  });
  return { session, output: () => chunks.join('') };
}
