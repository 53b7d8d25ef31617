import type { ChannelEdge } from '../model/schema-types.js';

export type AsyncSummaryLabel = 'pub' | 'req' | 'pub/req';

export interface AsyncSummary {
  /** The other service taking part in the exchange. */
  counterpart: string;
  outgoing: boolean;
  label: AsyncSummaryLabel;
  direction: string;
}

interface ChannelSets {
  outSend: Set<string>;
  outReply: Set<string>;
  inSend: Set<string>;
  inReply: Set<string>;
}

const DIRECTIONS: Record<'outgoing' | 'incoming', Record<AsyncSummaryLabel, string>> = {
  outgoing: {
    pub: 'publishes to',
    req: 'requests to',
    'pub/req': 'publishes to and requests from',
  },
  incoming: {
    pub: 'receives from',
    req: 'handles requests from',
    'pub/req': 'receives from and replies to',
  },
};

/**
 * `pub` when nothing is answered, `req` when every sent channel is answered,
 * `pub/req` when only some are.
 */
export function deriveAsyncLabel(
  sent: ReadonlySet<string>,
  replied: ReadonlySet<string>
): AsyncSummaryLabel | undefined {
  if (sent.size === 0) return undefined;
  if (replied.size === 0) return 'pub';
  for (const channel of sent) {
    if (!replied.has(channel)) return 'pub/req';
  }
  return 'req';
}

/**
 * Collapses the channel traffic between `serviceName` and each other known
 * service into at most one outgoing and one incoming summary.
 */
export function summarizeAsyncEdges(
  serviceName: string,
  edges: readonly ChannelEdge[],
  serviceNames: Iterable<string>
): AsyncSummary[] {
  const known = new Set(serviceNames);
  const byCounterpart = new Map<string, ChannelSets>();

  const setsFor = (counterpart: string): ChannelSets => {
    let sets = byCounterpart.get(counterpart);
    if (!sets) {
      sets = { outSend: new Set(), outReply: new Set(), inSend: new Set(), inReply: new Set() };
      byCounterpart.set(counterpart, sets);
    }
    return sets;
  };

  for (const edge of edges) {
    if (edge.source === serviceName) {
      if (edge.target === serviceName || !known.has(edge.target)) continue;
      const sets = setsFor(edge.target);
      // a reply we send answers a request the counterpart made
      (edge.kind === 'send' ? sets.outSend : sets.inReply).add(edge.channel);
    } else if (edge.target === serviceName) {
      if (!known.has(edge.source)) continue;
      const sets = setsFor(edge.source);
      (edge.kind === 'send' ? sets.inSend : sets.outReply).add(edge.channel);
    }
  }

  const summaries: AsyncSummary[] = [];
  for (const [counterpart, sets] of byCounterpart) {
    const outLabel = deriveAsyncLabel(sets.outSend, sets.outReply);
    if (outLabel) {
      summaries.push({
        counterpart,
        outgoing: true,
        label: outLabel,
        direction: DIRECTIONS.outgoing[outLabel],
      });
    }
    const inLabel = deriveAsyncLabel(sets.inSend, sets.inReply);
    if (inLabel) {
      summaries.push({
        counterpart,
        outgoing: false,
        label: inLabel,
        direction: DIRECTIONS.incoming[inLabel],
      });
    }
  }
  return summaries;
}
