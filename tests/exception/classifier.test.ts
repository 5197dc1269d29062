import { describe, it, expect } from 'vitest';
import { classifyFailure } from '../../src/exception/classifier.js';
import { NoSuchElementError, ProbeError } from '../../src/exception/errors.js';

describe('classifyFailure', () => {
  describe('probe errors', () => {
    it('uses the kind carried by a probe error', () => {
      expect(classifyFailure(new ProbeError('StaleElement', 'anything at all'))).toBe('StaleElement');
      expect(classifyFailure(new NoSuchElementError('By.id("x")'))).toBe('NoSuchElement');
    });
  });

  describe('NoSuchElement', () => {
    it('classifies webdriver-style lookup failures', () => {
      const error = new Error('no such element: Unable to locate element: {"method":"css selector"}');
      expect(classifyFailure(error)).toBe('NoSuchElement');
    });

    it('classifies locators that resolved to nothing', () => {
      expect(classifyFailure(new Error('locator.click: Error: locator resolved to 0 elements'))).toBe('NoSuchElement');
    });

    it('classifies plain string failures', () => {
      expect(classifyFailure('element not found')).toBe('NoSuchElement');
    });
  });

  describe('StaleElement', () => {
    it('classifies detached elements', () => {
      expect(classifyFailure(new Error('Element is not attached to the DOM'))).toBe('StaleElement');
      expect(classifyFailure(new Error('stale element reference: element is not attached'))).toBe('StaleElement');
    });
  });

  describe('NotInteractable', () => {
    it('classifies not clickable errors', () => {
      expect(classifyFailure(new Error('Element is not clickable at point (100, 200)'))).toBe('NotInteractable');
    });

    it('classifies intercepted click errors', () => {
      expect(classifyFailure(new Error('Element click intercepted by another element'))).toBe('NotInteractable');
    });
  });

  describe('InvalidSelector', () => {
    it('classifies selector parse errors', () => {
      expect(classifyFailure(new Error('Unexpected token "]" while parsing selector "div]"'))).toBe('InvalidSelector');
      expect(classifyFailure(new Error("'div[' is not a valid selector"))).toBe('InvalidSelector');
    });
  });

  describe('SessionClosed', () => {
    it('classifies closed pages and browsers', () => {
      expect(classifyFailure(new Error('Target page, context or browser has been closed'))).toBe('SessionClosed');
      expect(classifyFailure(new Error('invalid session id'))).toBe('SessionClosed');
    });
  });

  describe('Timeout', () => {
    it('classifies timeout messages', () => {
      expect(classifyFailure(new Error('Timeout 30000ms exceeded.'))).toBe('Timeout');
      expect(classifyFailure(new Error('Navigation timed out'))).toBe('Timeout');
    });

    it('classifies errors named TimeoutError', () => {
      const error = new Error('waiting failed');
      error.name = 'TimeoutError';
      expect(classifyFailure(error)).toBe('Timeout');
    });
  });

  describe('Unknown', () => {
    it('falls back for anything else', () => {
      expect(classifyFailure(new TypeError('Cannot read properties of undefined'))).toBe('Unknown');
      expect(classifyFailure({ code: 42 })).toBe('Unknown');
    });
  });
});
