import { FinalEvent } from '../../shared/types/events';
import { describeError } from '../errors';
import { TranscriptEventBus, Unsubscribe } from '../transcript/TranscriptEventBus';

/** Destination for finalized text. */
export interface Sink {
  readonly name: string;
  handleFinal(text: string): Promise<void>;
  close?(): Promise<void>;
}

/** True for finals that carry text worth delivering. */
export function isDeliverable(event: FinalEvent): boolean {
  return event.error === undefined && event.text.trim().length > 0;
}

/**
 * Subscribe a sink to finals without loss. A sink failure is reported on the
 * bus as a non-fatal `sink` error and the session carries on.
 */
export function attachSink(bus: TranscriptEventBus, sink: Sink): Unsubscribe {
  return bus.subscribeTo(
    'final',
    async (event) => {
      if (!isDeliverable(event)) return;
      try {
        await sink.handleFinal(event.text);
      } catch (err) {
        const message = `${sink.name} sink failed: ${describeError(err)}`;
        console.error('[Sink]', message);
        bus.publish({ type: 'error', kind: 'sink', message, fatal: false });
      }
    },
    { mode: 'lossless', name: `sink:${sink.name}` },
  );
}
