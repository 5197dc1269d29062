import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ImplicitWaitProbe } from '../../src/engines/implicit-wait-probe.js';
import { By } from '../../src/engines/locator.js';
import { WaitEngine } from '../../src/wait/wait-engine.js';
import { createWaitSpec } from '../../src/wait/wait-spec.js';
import { ManualClock } from '../../src/testing/manual-clock.js';
import { FakeProbe } from '../../src/testing/fake-probe.js';
import { presenceOfElementLocated } from '../../src/conditions/expected.js';
import {
  CancelledError,
  ConfigurationError,
  NoSuchElementError,
  ProbeError,
  WaitTimeoutError,
} from '../../src/exception/errors.js';
import type { AutomationProbe } from '../../src/types/index.js';

describe('ImplicitWaitProbe', () => {
  let clock: ManualClock;
  let engine: WaitEngine;

  beforeEach(() => {
    clock = new ManualClock();
    engine = new WaitEngine({ clock });
  });

  it('retries a lookup until the element appears', async () => {
    const locator = By.id('result');
    const inner: FakeProbe = new FakeProbe((_, lookup) => {
      if (lookup === 3) inner.place(locator, { text: 'done' });
    });
    const probe = new ImplicitWaitProbe(inner, 1000, engine);

    const element = await probe.findElement(locator);
    await expect(element.getText()).resolves.toBe('done');
    expect(clock.now()).toBe(500);
  });

  it('raises NoSuchElementError once the implicit wait lapses', async () => {
    const inner = new FakeProbe();
    const probe = new ImplicitWaitProbe(inner, 1000, engine);

    await expect(probe.findElement(By.id('ghost'))).rejects.toThrow(NoSuchElementError);
    expect(inner.lookupCount(By.id('ghost'))).toBe(5);
    expect(clock.now()).toBe(1000);
  });

  it('returns an empty list once the implicit wait lapses', async () => {
    const inner = new FakeProbe();
    const probe = new ImplicitWaitProbe(inner, 500, engine);

    await expect(probe.findElements(By.css('.row'))).resolves.toEqual([]);
    expect(inner.lookupCount(By.css('.row'))).toBe(3);
  });

  it('looks up once when the implicit wait is zero', async () => {
    const inner = new FakeProbe();
    const probe = new ImplicitWaitProbe(inner, 0, engine);

    await expect(probe.findElement(By.id('ghost'))).rejects.toThrow(NoSuchElementError);
    expect(inner.lookupCount(By.id('ghost'))).toBe(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('surfaces other lookup failures unwrapped', async () => {
    const closed = new ProbeError('SessionClosed', 'Target closed');
    const inner: AutomationProbe = {
      findElement: vi.fn().mockRejectedValue(closed),
      findElements: vi.fn().mockRejectedValue(closed),
      getTitle: vi.fn().mockResolvedValue('Example Domain'),
      getCurrentUrl: vi.fn().mockResolvedValue('https://example.com/'),
    };
    const probe = new ImplicitWaitProbe(inner, 1000, engine);

    await expect(probe.findElement(By.id('x'))).rejects.toBe(closed);
    await expect(probe.findElements(By.id('x'))).rejects.toBe(closed);
    expect(inner.findElement).toHaveBeenCalledTimes(1);
  });

  it('passes page reads to the wrapped probe', async () => {
    const inner = new FakeProbe();
    inner.title = 'Example Domain';
    inner.url = 'https://example.com/';
    const probe = new ImplicitWaitProbe(inner, 1000, engine);

    await expect(probe.getTitle()).resolves.toBe('Example Domain');
    await expect(probe.getCurrentUrl()).resolves.toBe('https://example.com/');
  });

  it('returns a new probe from withImplicitWait', () => {
    const probe = new ImplicitWaitProbe(new FakeProbe(), 1000, engine);
    const shorter = probe.withImplicitWait(200);

    expect(shorter).not.toBe(probe);
    expect(shorter.implicitWaitMs).toBe(200);
    expect(probe.implicitWaitMs).toBe(1000);
  });

  it('rejects a negative implicit wait', () => {
    expect(() => new ImplicitWaitProbe(new FakeProbe(), -1, engine)).toThrow(ConfigurationError);
  });

  it('spends the implicit wait inside each explicit attempt', async () => {
    const probe = new ImplicitWaitProbe(new FakeProbe(), 1000, engine);
    const spec = createWaitSpec({ timeoutMs: 500, pollIntervalMs: 500, ignoring: ['NoSuchElement'] });

    const error = await engine.until(probe, presenceOfElementLocated(By.id('ghost')), spec).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(WaitTimeoutError);
    expect(error).toMatchObject({ attempts: 1, elapsedMs: 1000 });
  });

  it('stops looking up when the calling wait is aborted', async () => {
    const controller = new AbortController();
    const ghost = By.id('ghost');
    const inner = new FakeProbe((_, lookup) => {
      if (lookup === 2) controller.abort();
    });
    const probe = new ImplicitWaitProbe(inner, 3000, engine);
    const spec = createWaitSpec({ timeoutMs: 10_000, ignoring: ['NoSuchElement'] });

    const error = await engine
      .until(probe, presenceOfElementLocated(ghost), spec, { signal: controller.signal })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CancelledError);
    expect(error).toMatchObject({ attempts: 1, elapsedMs: 250 });
    expect(inner.lookupCount(ghost)).toBe(2);
    expect(clock.now()).toBe(250);
  });

  it('rejects a single lookup with CancelledError when its signal aborts', async () => {
    const controller = new AbortController();
    controller.abort();
    const inner = new FakeProbe();
    const probe = new ImplicitWaitProbe(inner, 3000, engine);

    await expect(probe.findElements(By.css('.row'), controller.signal)).rejects.toThrow(CancelledError);
    expect(inner.lookupCount(By.css('.row'))).toBe(0);
  });

  it('ends a long implicit wait soon after an abort', async () => {
    const realEngine = new WaitEngine();
    const probe = new ImplicitWaitProbe(new FakeProbe(), 3000, realEngine);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);
    const started = performance.now();

    const error = await realEngine
      .until(probe, presenceOfElementLocated(By.id('ghost')), createWaitSpec({ timeoutMs: 10_000 }), {
        signal: controller.signal,
      })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CancelledError);
    expect(performance.now() - started).toBeLessThan(1000);
  });
});
