import { TranscriptionEvent } from '../../../shared/types/events';
import { DeferredEngine, ScriptedEngine, deferred, framesFrom } from '../../__tests__/fakes';
import { EngineError } from '../../errors';
import { DecodeScheduler } from '../../stt/DecodeScheduler';
import { STTEngine } from '../../stt/STTEngine';
import { RollingWindow } from '../../vad/RollingWindow';
import { PartialDecodeLoop, PartialDecodeLoopOptions } from '../PartialDecodeLoop';
import { TranscriptEventBus } from '../TranscriptEventBus';

const options: PartialDecodeLoopOptions = {
  enabled: true,
  windowMs: 5000,
  cadenceMs: 1000,
  minAudioMs: 1200,
  language: 'en',
  task: 'transcribe',
};

function setup(engine: STTEngine, frameCount = 50) {
  const window = new RollingWindow(5000);
  for (const frame of framesFrom([['speech', frameCount]])) window.push(frame);

  const bus = new TranscriptEventBus();
  const events: TranscriptionEvent[] = [];
  bus.on('event', (event: TranscriptionEvent) => events.push(event));

  const scheduler = new DecodeScheduler();
  const state = { active: true };
  const loop = new PartialDecodeLoop(
    { window, scheduler, engine, bus, isActive: () => state.active },
    options,
  );
  return { loop, bus, events, scheduler, state, window };
}

describe('PartialDecodeLoop', () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  test('decodes the window and publishes a capped-confidence partial', async () => {
    const engine = new ScriptedEngine();
    const { loop, events } = setup(engine);

    await expect(loop.runOnce()).resolves.toBe('emitted');

    expect(engine.calls).toHaveLength(1);
    expect(engine.calls[0].request).toEqual({ isFinal: false, language: 'en', task: 'transcribe' });
    expect(engine.calls[0].samples).toHaveLength(50 * 480);
    expect(events).toEqual([
      expect.objectContaining({ type: 'partial', text: 'hello world', confidence: 0.5, windowMs: 1500 }),
    ]);
  });

  test('keeps a lower engine confidence', async () => {
    const engine = new ScriptedEngine(() => ({ text: 'maybe', confidence: 0.2, timing: { decodeMs: 1, audioMs: 0 } }));
    const { loop, events } = setup(engine);

    await loop.runOnce();
    expect(events[0]).toMatchObject({ type: 'partial', confidence: 0.2 });
  });

  test('blank text publishes nothing', async () => {
    const engine = new ScriptedEngine(() => ({ text: '   ', timing: { decodeMs: 1, audioMs: 0 } }));
    const { loop, events } = setup(engine);

    await expect(loop.runOnce()).resolves.toBe('empty');
    expect(events).toEqual([]);
  });

  test('tick does nothing while no segment is open', () => {
    const engine = new ScriptedEngine();
    const { loop, state } = setup(engine);
    state.active = false;

    loop.tick();
    expect(engine.calls).toHaveLength(0);
  });

  test('tick waits for enough audio', () => {
    const engine = new ScriptedEngine();
    const { loop } = setup(engine, 30);

    loop.tick();
    expect(engine.calls).toHaveLength(0);
  });

  test('a tick that comes due mid-decode is skipped, not queued', async () => {
    const engine = new DeferredEngine();
    const { loop } = setup(engine);

    loop.tick();
    loop.tick();
    loop.tick();

    expect(engine.calls).toHaveLength(1);
    expect(loop.missedTicks).toBe(2);

    engine.answer(0, 'partial');
    await loop.stop();
    expect(loop.isDecoding).toBe(false);
  });

  test('skips while the engine is busy with a final', async () => {
    const engine = new ScriptedEngine();
    const { loop, scheduler } = setup(engine);
    const gate = deferred<void>();
    const final = scheduler.run('final', () => gate.promise);

    await expect(loop.runOnce()).resolves.toBe('skipped');
    expect(engine.calls).toHaveLength(0);

    gate.resolve();
    await final;
  });

  test('engine failures become non-fatal error events', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const engine = new ScriptedEngine(() => new EngineError('out of memory'));
    const { loop, events } = setup(engine);

    await expect(loop.runOnce()).resolves.toBe('failed');
    expect(events).toEqual([
      expect.objectContaining({ type: 'error', kind: 'engine', message: 'out of memory', fatal: false, stage: 'partial' }),
    ]);
  });

  test('runs on the configured cadence once started', async () => {
    vi.useFakeTimers();
    const engine = new ScriptedEngine();
    const { loop } = setup(engine);

    loop.start();
    expect(loop.isRunning).toBe(true);
    await vi.advanceTimersByTimeAsync(999);
    expect(engine.calls).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(1);
    expect(engine.calls).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(1000);
    expect(engine.calls).toHaveLength(2);

    await loop.stop();
    expect(loop.isRunning).toBe(false);
  });

  test('stays off when partials are disabled', () => {
    const engine = new ScriptedEngine();
    const window = new RollingWindow(5000);
    const loop = new PartialDecodeLoop(
      { window, scheduler: new DecodeScheduler(), engine, bus: new TranscriptEventBus(), isActive: () => true },
      { ...options, enabled: false },
    );

    loop.start();
    expect(loop.isRunning).toBe(false);
  });
});
