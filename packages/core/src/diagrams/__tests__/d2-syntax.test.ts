import { describe, it, expect } from 'vitest';
import { d2String, formatCluster, formatEdge, formatNode, nodePath } from '../d2-syntax.js';
import type { DiagramNode } from '../diagram-graph.js';

const orders: DiagramNode = {
  id: 'service_orders',
  label: 'Orders',
  kind: 'service',
  shape: 'rectangle',
  clusterId: 'system_shop',
};

const database: DiagramNode = {
  id: 'external_orders-db',
  label: 'Orders DB',
  kind: 'external',
  shape: 'cylinder',
  tooltip: 'Order storage',
};

const mailer: DiagramNode = {
  id: 'service_mailer',
  label: 'Mailer',
  kind: 'service',
  shape: 'rectangle',
};

describe('d2String', () => {
  it('quotes plain labels', () => {
    expect(d2String('Test Service')).toBe('"Test Service"');
  });

  it('escapes quotes, backslashes, substitutions and line breaks', () => {
    expect(d2String('say "hi" \\ $HOME\nbye')).toBe(String.raw`"say \"hi\" \\ \$HOME\nbye"`);
  });

  it('leaves D2 structural characters inside the quotes', () => {
    expect(d2String('a -> b: {c}; # d')).toBe('"a -> b: {c}; # d"');
  });
});

describe('nodePath', () => {
  it('qualifies clustered nodes with their cluster key', () => {
    expect(nodePath(orders)).toBe('system_shop.service_orders');
    expect(nodePath(mailer)).toBe('service_mailer');
  });
});

describe('formatNode', () => {
  it('writes a bare declaration for plain service nodes', () => {
    expect(formatNode(mailer)).toBe('service_mailer: "Mailer"');
  });

  it('writes shape, class and tooltip for external nodes', () => {
    expect(formatNode(database)).toBe(
      [
        'external_orders-db: "Orders DB" {',
        '  shape: cylinder',
        '  class: external',
        '  tooltip: "Order storage"',
        '}',
      ].join('\n')
    );
  });

  it('indents by depth', () => {
    expect(formatNode(mailer, 2)).toBe('    service_mailer: "Mailer"');
  });
});

describe('formatCluster', () => {
  it('nests member nodes under the cluster', () => {
    expect(formatCluster({ id: 'system_shop', label: 'Shop' }, [orders, database])).toBe(
      [
        'system_shop: "Shop" {',
        '  class: cluster',
        '  service_orders: "Orders"',
        '  external_orders-db: "Orders DB" {',
        '    shape: cylinder',
        '    class: external',
        '    tooltip: "Order storage"',
        '  }',
        '}',
      ].join('\n')
    );
  });

  it('writes an empty cluster', () => {
    expect(formatCluster({ id: 'system_empty', label: 'Empty' }, [])).toBe(
      'system_empty: "Empty" {\n  class: cluster\n}'
    );
  });
});

describe('formatEdge', () => {
  it('connects absolute node paths with a quoted label', () => {
    expect(
      formatEdge(
        { from: orders.id, to: database.id, label: 'uses [PostgreSQL]', style: 'sync' },
        orders,
        database
      )
    ).toBe('system_shop.service_orders -> external_orders-db: "uses [PostgreSQL]"');
  });

  it('marks async edges with the async class', () => {
    expect(
      formatEdge(
        { from: orders.id, to: mailer.id, label: 'order.created', style: 'async' },
        orders,
        mailer
      )
    ).toBe('system_shop.service_orders -> service_mailer: "order.created" {class: async}');
  });

  it('omits an empty label', () => {
    expect(formatEdge({ from: mailer.id, to: database.id, label: '', style: 'sync' }, mailer, database)).toBe(
      'service_mailer -> external_orders-db'
    );
  });
});
