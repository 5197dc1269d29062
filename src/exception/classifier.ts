import type { FailureKind } from '../types/index.js';
import { ProbeError, messageOf } from './errors.js';

export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof ProbeError) {
    return error.kind;
  }

  const text = messageOf(error).toLowerCase();

  if (isSessionClosed(text)) {
    return 'SessionClosed';
  }

  if (isInvalidSelector(text)) {
    return 'InvalidSelector';
  }

  if (isStaleElement(text)) {
    return 'StaleElement';
  }

  if (isNotInteractable(text)) {
    return 'NotInteractable';
  }

  if (isNoSuchElement(text)) {
    return 'NoSuchElement';
  }

  if (isTimeout(error, text)) {
    return 'Timeout';
  }

  return 'Unknown';
}

function isSessionClosed(text: string): boolean {
  const patterns = [
    'target closed',
    'target page, context or browser has been closed',
    'browser has been closed',
    'page has been closed',
    'session not created',
    'invalid session id',
  ];
  return patterns.some((p) => text.includes(p));
}

function isInvalidSelector(text: string): boolean {
  const patterns = [
    'invalid selector',
    'is not a valid selector',
    'unexpected token',
    'unknown engine',
  ];
  return patterns.some((p) => text.includes(p));
}

function isStaleElement(text: string): boolean {
  const patterns = [
    'stale element',
    'not attached to the dom',
    'element is not attached',
    'element was detached',
  ];
  return patterns.some((p) => text.includes(p));
}

function isNotInteractable(text: string): boolean {
  const patterns = [
    'not interactable',
    'not clickable',
    'element is not visible',
    'element is not enabled',
    'element is not stable',
    'intercepted',
    'pointer-events: none',
  ];
  return patterns.some((p) => text.includes(p));
}

function isNoSuchElement(text: string): boolean {
  const patterns = [
    'no such element',
    'no element found',
    'element not found',
    'unable to locate element',
    'unable to find',
    'could not find',
    'resolved to 0 elements',
  ];
  return patterns.some((p) => text.includes(p));
}

function isTimeout(error: unknown, text: string): boolean {
  if (error instanceof Error && error.name === 'TimeoutError') {
    return true;
  }
  return text.includes('timeout') || text.includes('timed out');
}
