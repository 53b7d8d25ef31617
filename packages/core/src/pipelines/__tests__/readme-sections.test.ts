import { describe, it, expect } from 'vitest';
import {
  formatAsyncSummaries,
  formatDiagram,
  formatRelationshipTable,
  formatServiceSection,
  formatSystemsSection,
} from '../readme-sections.js';

describe('formatDiagram', () => {
  it('embeds the image and links the script', () => {
    expect(formatDiagram('Overview', { script: 'a.d2', image: 'a.svg' })).toBe(
      '![Overview](a.svg)\n\n[D2 source](a.d2)'
    );
  });

  it('links only the script when nothing was rendered', () => {
    expect(formatDiagram('Overview', { script: 'a.d2' })).toBe('D2 source: [a.d2](a.d2)');
  });
});

describe('formatRelationshipTable', () => {
  it('escapes pipes and flattens line breaks', () => {
    expect(
      formatRelationshipTable([
        { action: 'uses', participant: 'Cache', technology: 'Redis', description: 'hot | cold\npaths' },
      ])
    ).toBe(
      [
        '| Action | Participant | Technology | Tags | Description |',
        '| --- | --- | --- | --- | --- |',
        '| uses | Cache | Redis |  | hot \\| cold paths |',
      ].join('\n')
    );
  });

  it('shows the proto file and tags', () => {
    const table = formatRelationshipTable([
      {
        action: 'requests',
        participant: 'Payments',
        technology: 'gRPC',
        proto: 'payments.v1.proto',
        tags: ['critical', 'pci'],
      },
      { action: 'requests', participant: 'Ledger', proto: 'ledger.proto' },
    ]);
    expect(table.split('\n').slice(2)).toEqual([
      '| requests | Payments | gRPC (payments.v1.proto) | critical, pci |  |',
      '| requests | Ledger | ledger.proto |  |  |',
    ]);
  });

  it('marks external and person participants', () => {
    const table = formatRelationshipTable([
      { action: 'requests', participant: 'Stripe', external: true },
      { action: 'receives', participant: 'Customer', person: true },
    ]);
    expect(table.split('\n').slice(2)).toEqual([
      '| requests | Stripe _(external)_ |  |  |  |',
      '| receives | Customer _(person)_ |  |  |  |',
    ]);
  });

  it('notes an empty list', () => {
    expect(formatRelationshipTable([])).toBe('_No relationships declared._');
  });
});

describe('formatAsyncSummaries', () => {
  it('writes one bullet per summary', () => {
    expect(
      formatAsyncSummaries([
        { counterpart: 'Billing', outgoing: true, label: 'pub', direction: 'publishes to' },
        { counterpart: 'Stock', outgoing: false, label: 'req', direction: 'handles requests from' },
      ])
    ).toBe('- publishes to **Billing** (`pub`)\n- handles requests from **Stock** (`req`)');
  });
});

describe('formatSystemsSection', () => {
  it('notes when there are no systems', () => {
    expect(formatSystemsSection([])).toBe('_No systems declared._');
  });
});

describe('formatServiceSection', () => {
  it('skips absent facts', () => {
    expect(
      formatServiceSection({
        service: { info: { name: 'Mailer' }, relationships: [] },
        diagram: { script: 'm.d2' },
        asyncSummaries: [],
      })
    ).toBe(
      [
        '### Mailer',
        'D2 source: [m.d2](m.d2)',
        '**Relationships**',
        '_No relationships declared._',
        '**Async messaging**',
        '_No asynchronous messaging._',
      ].join('\n\n')
    );
  });
});
