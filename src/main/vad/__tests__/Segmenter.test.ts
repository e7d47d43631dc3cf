import { CompletedSegment } from '../../../shared/types/segment';
import { framesFrom, makeFrame, markerClassifier } from '../../__tests__/fakes';
import { AudioFrame } from '../../audio/AudioFrame';
import { DEFAULT_SEGMENTER_OPTIONS, Segmenter } from '../Segmenter';
import { VoiceActivityClassifier } from '../VoiceActivityClassifier';

function runAll(segmenter: Segmenter, frames: AudioFrame[]): CompletedSegment[] {
  const segments: CompletedSegment[] = [];
  for (const frame of frames) {
    const { segment } = segmenter.process(frame);
    if (segment) segments.push(segment);
  }
  return segments;
}

describe('Segmenter', () => {
  // Defaults: 30 ms frames, 300 ms hangover (10 frames), 150 ms pre-roll (5 frames),
  // 300 ms minimum speech (10 frames).
  let segmenter: Segmenter;

  beforeEach(() => {
    segmenter = new Segmenter(markerClassifier, { ...DEFAULT_SEGMENTER_OPTIONS });
  });

  // ── Single utterance ────────────────────────────────────────────────────

  test('one utterance becomes one segment with pre-roll and hangover tail', () => {
    const frames = framesFrom([['silence', 5], ['speech', 67], ['silence', 10]]);
    const closedAt: number[] = [];

    frames.forEach((frame, i) => {
      if (segmenter.process(frame).segment) closedAt.push(i);
    });

    expect(closedAt).toEqual([81]);
  });

  test('segment timing covers pre-roll, speech and tail', () => {
    const frames = framesFrom([['silence', 5], ['speech', 67], ['silence', 10]]);
    const [segment] = runAll(segmenter, frames);

    expect(segment.durationMs).toBe(2460);
    expect(segment.prerollMs).toBe(150);
    expect(segment.speechMs).toBe(2010);
    expect(segment.samples).toHaveLength(82 * 480);
    expect(segment.startedAt).toBe(frames[0].capturedAt);
    expect(segment.endedAt).toBe(frames[81].capturedAt);
    expect(segmenter.state).toBe('silence');
  });

  test('segment audio keeps capture order', () => {
    const frames = framesFrom([['silence', 5], ['speech', 67], ['silence', 10]]);
    const [segment] = runAll(segmenter, frames);

    const order = frames.map((_, k) => segment.samples[k * 480 + 1]);
    expect(order).toEqual(frames.map((f) => Math.fround(f.index / 1000)));
  });

  test('moves through active and hangover before closing', () => {
    const frames = framesFrom([['silence', 2], ['speech', 12], ['silence', 10]]);
    const states = frames.map((frame) => segmenter.process(frame).state);

    expect(states.slice(0, 2)).toEqual(['silence', 'silence']);
    expect(states.slice(2, 14).every((s) => s === 'active')).toBe(true);
    expect(states.slice(14, 23).every((s) => s === 'hangover')).toBe(true);
    expect(states[23]).toBe('silence');
  });

  // ── Gaps ────────────────────────────────────────────────────────────────

  test('a pause shorter than hangover keeps one segment', () => {
    const segments = runAll(
      segmenter,
      framesFrom([['speech', 20], ['silence', 6], ['speech', 20], ['silence', 10]]),
    );

    expect(segments).toHaveLength(1);
    expect(segments[0].speechMs).toBe(1200);
    expect(segments[0].durationMs).toBe(1680);
  });

  test('a pause longer than hangover splits the utterances', () => {
    const segments = runAll(
      segmenter,
      framesFrom([['speech', 20], ['silence', 15], ['speech', 20], ['silence', 10]]),
    );

    expect(segments).toHaveLength(2);
    expect(segments[0].id).not.toBe(segments[1].id);
    // Second segment picks up the five silence frames right before it.
    expect(segments[1].prerollMs).toBe(150);
  });

  // ── Short segments ──────────────────────────────────────────────────────

  test('a brief flicker is discarded without a segment', () => {
    const frames = framesFrom([['speech', 2], ['silence', 20]]);
    const results = frames.map((frame) => segmenter.process(frame));

    expect(results.filter((r) => r.segment)).toHaveLength(0);
    // Held open for one extra hangover window before being dropped.
    expect(results[11].state).toBe('hangover');
    expect(results[21].state).toBe('silence');
    expect(segmenter.discardedSegments).toBe(1);
    expect(segmenter.hasOpenSegment).toBe(false);
  });

  test('a short blip merges into speech that follows within the extra window', () => {
    const segments = runAll(
      segmenter,
      framesFrom([['speech', 3], ['silence', 12], ['speech', 15], ['silence', 10]]),
    );

    expect(segments).toHaveLength(1);
    expect(segments[0].speechMs).toBe(540);
    expect(segments[0].durationMs).toBe(1200);
    expect(segmenter.discardedSegments).toBe(0);
  });

  // ── Pre-roll ────────────────────────────────────────────────────────────

  test('pre-roll keeps only the most recent silence', () => {
    const frames = framesFrom([['silence', 8], ['speech', 12], ['silence', 10]]);
    const [segment] = runAll(segmenter, frames);

    expect(segment.prerollMs).toBe(150);
    expect(segment.startedAt).toBe(frames[3].capturedAt);
  });

  test('zero pre-roll starts the segment on the first speech frame', () => {
    segmenter = new Segmenter(markerClassifier, { ...DEFAULT_SEGMENTER_OPTIONS, prerollMs: 0 });
    const frames = framesFrom([['silence', 8], ['speech', 12], ['silence', 10]]);
    const [segment] = runAll(segmenter, frames);

    expect(segment.prerollMs).toBe(0);
    expect(segment.startedAt).toBe(frames[8].capturedAt);
  });

  // ── Invariants ──────────────────────────────────────────────────────────

  test('a segment is open exactly when the state is not silence', () => {
    const frames = framesFrom([
      ['silence', 3], ['speech', 2], ['silence', 25], ['speech', 14],
      ['silence', 4], ['speech', 1], ['silence', 12], ['speech', 30], ['silence', 3],
    ]);

    for (const frame of frames) {
      const { state, isActive } = segmenter.process(frame);
      expect(segmenter.hasOpenSegment).toBe(state !== 'silence');
      expect(isActive).toBe(state !== 'silence');
    }
  });

  // ── Shutdown and failures ───────────────────────────────────────────────

  test('flush closes a long enough open segment', () => {
    runAll(segmenter, framesFrom([['speech', 12]]));
    const segment = segmenter.flush();

    expect(segment?.durationMs).toBe(360);
    expect(segmenter.state).toBe('silence');
    expect(segmenter.flush()).toBeUndefined();
  });

  test('flush drops a segment that is too short', () => {
    runAll(segmenter, framesFrom([['speech', 2]]));

    expect(segmenter.flush()).toBeUndefined();
    expect(segmenter.discardedSegments).toBe(1);
  });

  test('classifier failures count as silence and are logged once per streak', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const broken: VoiceActivityClassifier = {
      classify: () => {
        throw new Error('model unavailable');
      },
    };
    segmenter = new Segmenter(broken, { ...DEFAULT_SEGMENTER_OPTIONS });

    const results = [0, 1, 2].map((i) => segmenter.process(makeFrame(i, true)));

    expect(results.every((r) => !r.isSpeech && r.state === 'silence')).toBe(true);
    expect(segmenter.classifierFailures).toBe(3);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });
});
