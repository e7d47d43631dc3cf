import { AudioFrame } from '../../audio/AudioFrame';
import { RollingWindow } from '../RollingWindow';

function frame(index: number): AudioFrame {
  return { index, capturedAt: index * 30, samples: new Float32Array(480).fill(index) };
}

describe('RollingWindow', () => {
  test('holds five seconds of 30 ms frames by default sizing', () => {
    expect(new RollingWindow(5000).capacity).toBe(166);
  });

  test('snapshot covers what has been pushed so far', () => {
    const window = new RollingWindow(5000);
    window.push(frame(1));
    window.push(frame(2));
    window.push(frame(3));

    const snapshot = window.snapshot();
    expect(snapshot.durationMs).toBe(90);
    expect(snapshot.samples).toHaveLength(1440);
    expect(snapshot.endedAt).toBe(90);
    expect(window.durationMs).toBe(90);
  });

  test('oldest frames fall out once full', () => {
    const window = new RollingWindow(90, 30);
    for (let i = 0; i < 5; i++) window.push(frame(i));

    const { samples, durationMs } = window.snapshot();
    expect(durationMs).toBe(90);
    expect([samples[0], samples[480], samples[960]]).toEqual([2, 3, 4]);
  });

  test('clear empties the window', () => {
    const window = new RollingWindow(5000);
    window.push(frame(1));
    window.clear();

    expect(window.isEmpty).toBe(true);
    const snapshot = window.snapshot();
    expect(snapshot.samples).toHaveLength(0);
    expect(snapshot.durationMs).toBe(0);
    expect(snapshot.endedAt).toBe(0);
  });
});
