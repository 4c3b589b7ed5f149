import { DependencyResolver, sortSummaryRows } from '../../src/graph/dependency-resolver';
import type { Cascade } from '../../src/graph/dependency-resolver';
import { EdgeKind, objectKey } from '../../src/database/models';
import {
  CascadeAbortedError,
  CatalogUnavailableError,
  InvalidOptionError,
  ObjectNotFoundError,
} from '../../src/utils/errors';
import { FakeCatalogGateway, createScenarioCatalog } from '../helpers/fake-catalog-gateway';

// Compact "from->to:KIND[:label]" view of each level's edges
function describeLevels(cascade: Cascade): string[][] {
  return cascade.levels.map(level =>
    level.edges.map(edge => {
      const base = `${objectKey(edge.from)}->${objectKey(edge.to)}:${edge.kind}`;
      return edge.label !== undefined ? `${base}:${edge.label}` : base;
    })
  );
}

function levelObjects(cascade: Cascade): string[][] {
  return cascade.levels.map(level => level.objects.map(objectKey));
}

describe('DependencyResolver', () => {
  describe('cascade', () => {
    it('should resolve the table, view, function and foreign key scenario', async () => {
      const catalog = createScenarioCatalog();
      const resolver = new DependencyResolver(catalog);

      const cascade = await resolver.cascade(catalog.get('app.t1'));

      expect(describeLevels(cascade)).toEqual([
        ['app.v1->app.t1:USES', 'app.t2->app.t1:FOREIGN_KEY:t1_id'],
        ['app.f1->app.v1:USES'],
        [],
      ]);
      expect(levelObjects(cascade)).toEqual([['app.t1'], ['app.v1', 'app.t2'], ['app.f1']]);
      expect(cascade.visited.map(objectKey)).toEqual(['app.t1', 'app.v1', 'app.t2', 'app.f1']);
      expect(cascade.truncated).toBe(false);
    });

    it('should query dependents before foreign keys, one object at a time', async () => {
      const catalog = createScenarioCatalog();
      const resolver = new DependencyResolver(catalog);

      await resolver.cascade(catalog.get('app.t1'));

      expect(catalog.calls).toEqual([
        'directDependents:app.t1',
        'foreignKeyReferences:app.t1',
        'directDependents:app.v1',
        'foreignKeyReferences:app.v1',
        'directDependents:app.t2',
        'foreignKeyReferences:app.t2',
        'directDependents:app.f1',
        'foreignKeyReferences:app.f1',
      ]);
    });

    it('should produce identical results for repeated calls', async () => {
      const catalog = createScenarioCatalog();
      const resolver = new DependencyResolver(catalog);

      const first = await resolver.cascade(catalog.get('app.t1'));
      const second = await resolver.cascade(catalog.get('app.t1'));

      expect(second).toEqual(first);
    });

    it('should terminate on a self-referencing foreign key and record it once', async () => {
      const catalog = new FakeCatalogGateway()
        .table('app', 'employees')
        .foreignKey('app.employees', 'app.employees', ['manager_id']);
      const resolver = new DependencyResolver(catalog);

      const cascade = await resolver.cascade(catalog.get('app.employees'));

      expect(describeLevels(cascade)).toEqual([
        ['app.employees->app.employees:FOREIGN_KEY:manager_id'],
      ]);
      expect(cascade.visited.map(objectKey)).toEqual(['app.employees']);
      expect(catalog.countCalls('directDependents', 'app.employees')).toBe(1);
    });

    it('should expand a diamond dependency once while keeping both edges', async () => {
      const catalog = new FakeCatalogGateway()
        .table('app', 'root')
        .view('app', 'a')
        .view('app', 'b')
        .view('app', 'c')
        .uses('app.a', 'app.root')
        .uses('app.b', 'app.root')
        .uses('app.c', 'app.a')
        .uses('app.c', 'app.b');
      const resolver = new DependencyResolver(catalog);

      const cascade = await resolver.cascade(catalog.get('app.root'));

      expect(describeLevels(cascade)).toEqual([
        ['app.a->app.root:USES', 'app.b->app.root:USES'],
        ['app.c->app.a:USES', 'app.c->app.b:USES'],
        [],
      ]);
      expect(levelObjects(cascade)).toEqual([['app.root'], ['app.a', 'app.b'], ['app.c']]);
      expect(catalog.countCalls('directDependents', 'app.c')).toBe(1);
    });

    it('should record edges back into visited objects without re-expanding them', async () => {
      // f1 uses v1 and v1 calls f1: a definition cycle
      const catalog = new FakeCatalogGateway()
        .table('app', 't1')
        .view('app', 'v1')
        .fn('app', 'f1')
        .uses('app.v1', 'app.t1')
        .uses('app.f1', 'app.v1')
        .uses('app.v1', 'app.f1')
        .foreignKey('app.t1', 'app.t1', ['parent_id']);
      const resolver = new DependencyResolver(catalog);

      const cascade = await resolver.cascade(catalog.get('app.t1'));

      expect(describeLevels(cascade)).toEqual([
        ['app.v1->app.t1:USES', 'app.t1->app.t1:FOREIGN_KEY:parent_id'],
        ['app.f1->app.v1:USES'],
        ['app.v1->app.f1:USES'],
      ]);
      expect(catalog.countCalls('directDependents', 'app.v1')).toBe(1);
      expect(catalog.countCalls('directDependents', 'app.t1')).toBe(1);
    });

    it('should place every visited object in exactly one level', async () => {
      const catalog = new FakeCatalogGateway()
        .table('app', 'orders')
        .table('app', 'order_items')
        .view('app', 'order_totals')
        .view('app', 'daily_totals')
        .fn('app', 'refresh_totals')
        .foreignKey('app.order_items', 'app.orders', ['order_id'])
        .uses('app.order_totals', 'app.orders')
        .uses('app.order_totals', 'app.order_items')
        .uses('app.daily_totals', 'app.order_totals')
        .uses('app.refresh_totals', 'app.daily_totals')
        .uses('app.refresh_totals', 'app.orders');
      const resolver = new DependencyResolver(catalog);

      const cascade = await resolver.cascade(catalog.get('app.orders'));

      const placed = cascade.levels.flatMap(level => level.objects.map(objectKey));
      expect(placed.sort()).toEqual(cascade.visited.map(objectKey).sort());
      expect(new Set(placed).size).toBe(placed.length);
      expect(cascade.visited).toHaveLength(5);
    });

    it('should keep every edge the catalog returns for visited objects', async () => {
      const catalog = new FakeCatalogGateway()
        .table('app', 'orders')
        .table('app', 'order_items')
        .view('app', 'order_totals')
        .foreignKey('app.order_items', 'app.orders', ['order_id'])
        .foreignKey('app.order_items', 'app.orders', ['replaced_order_id'])
        .uses('app.order_totals', 'app.orders')
        .uses('app.order_totals', 'app.order_items');
      const resolver = new DependencyResolver(catalog);

      const cascade = await resolver.cascade(catalog.get('app.orders'));

      expect(describeLevels(cascade)).toEqual([
        [
          'app.order_totals->app.orders:USES',
          'app.order_items->app.orders:FOREIGN_KEY:order_id',
          'app.order_items->app.orders:FOREIGN_KEY:replaced_order_id',
        ],
        ['app.order_totals->app.order_items:USES'],
      ]);
    });

    it('should join composite foreign key columns in the label', async () => {
      const catalog = new FakeCatalogGateway()
        .table('app', 'shipments')
        .table('app', 'shipment_lines')
        .foreignKey('app.shipment_lines', 'app.shipments', ['shipment_id', 'carrier_id']);
      const resolver = new DependencyResolver(catalog);

      const cascade = await resolver.cascade(catalog.get('app.shipments'));

      expect(cascade.levels[0].edges[0]).toEqual({
        from: catalog.get('app.shipment_lines'),
        to: catalog.get('app.shipments'),
        kind: EdgeKind.FOREIGN_KEY,
        label: 'shipment_id, carrier_id',
      });
    });

    it('should stop at the maximum depth and keep the pending frontier unexpanded', async () => {
      const catalog = createScenarioCatalog();
      const resolver = new DependencyResolver(catalog);

      const cascade = await resolver.cascade(catalog.get('app.t1'), { maxDepth: 1 });

      expect(levelObjects(cascade)).toEqual([['app.t1'], ['app.v1', 'app.t2']]);
      expect(cascade.levels[1].edges).toEqual([]);
      expect(cascade.truncated).toBe(true);
      expect(cascade.visited.map(objectKey)).toEqual(['app.t1', 'app.v1', 'app.t2']);
      expect(catalog.countCalls('directDependents', 'app.v1')).toBe(0);
    });

    it('should not mark a cascade as truncated when the depth limit is never hit', async () => {
      const catalog = createScenarioCatalog();
      const resolver = new DependencyResolver(catalog);

      const cascade = await resolver.cascade(catalog.get('app.t1'), { maxDepth: 5 });

      expect(cascade.truncated).toBe(false);
      expect(cascade.levels).toHaveLength(3);
    });

    it('should reject a negative or fractional maximum depth', async () => {
      const catalog = createScenarioCatalog();
      const resolver = new DependencyResolver(catalog);

      await expect(resolver.cascade(catalog.get('app.t1'), { maxDepth: -1 })).rejects.toThrow(
        InvalidOptionError
      );
      await expect(resolver.cascade(catalog.get('app.t1'), { maxDepth: 1.5 })).rejects.toThrow(
        InvalidOptionError
      );
      expect(catalog.calls).toEqual([]);
    });

    it('should propagate catalog failures without a partial cascade', async () => {
      const catalog = createScenarioCatalog().failOn('foreignKeyReferences', 'app.v1');
      const resolver = new DependencyResolver(catalog);

      const result = resolver.cascade(catalog.get('app.t1'));

      await expect(result).rejects.toThrow(CatalogUnavailableError);
      await expect(result).rejects.toThrow(
        'Catalog unavailable during foreignKeyReferences: connection reset by peer'
      );
      expect(catalog.countCalls('directDependents', 'app.t2')).toBe(0);
    });

    it('should abort between levels once the signal fires', async () => {
      const catalog = createScenarioCatalog();
      const controller = new AbortController();
      catalog.onQuery = (_operation, key) => {
        if (key === 'app.t1') controller.abort();
      };
      const resolver = new DependencyResolver(catalog);

      const result = resolver.cascade(catalog.get('app.t1'), { signal: controller.signal });

      await expect(result).rejects.toThrow(CascadeAbortedError);
      await expect(result).rejects.toThrow('Cascade aborted before expanding level 1');
      expect(catalog.countCalls('directDependents', 'app.v1')).toBe(0);
    });

    it('should not start when the signal is already aborted', async () => {
      const catalog = createScenarioCatalog();
      const controller = new AbortController();
      controller.abort();
      const resolver = new DependencyResolver(catalog);

      await expect(
        resolver.cascade(catalog.get('app.t1'), { signal: controller.signal })
      ).rejects.toThrow('Cascade aborted before expanding level 0');
      expect(catalog.calls).toEqual([]);
    });
  });

  describe('cascadeByName', () => {
    it('should resolve the root through the catalog', async () => {
      const catalog = createScenarioCatalog();
      const resolver = new DependencyResolver(catalog);

      const cascade = await resolver.cascadeByName('app', 'v1');

      expect(cascade.root).toBe(catalog.get('app.v1'));
      expect(describeLevels(cascade)).toEqual([['app.f1->app.v1:USES'], []]);
    });

    it('should raise ObjectNotFoundError before any traversal', async () => {
      const catalog = createScenarioCatalog();
      const resolver = new DependencyResolver(catalog);

      await expect(resolver.cascadeByName('app', 'missing')).rejects.toThrow(ObjectNotFoundError);
      await expect(resolver.cascadeByName('app', 'missing')).rejects.toThrow(
        'Object "app.missing" does not exist'
      );
      expect(catalog.calls.every(call => call.startsWith('findSchemaObject:'))).toBe(true);
    });
  });

  describe('summarize', () => {
    it('should count first-level dependents and foreign keys in catalog order', async () => {
      const catalog = createScenarioCatalog();
      const resolver = new DependencyResolver(catalog);

      const rows = await resolver.summarize('app');

      expect(
        rows.map(row => [objectKey(row.object), row.dependentCount, row.foreignKeyCount])
      ).toEqual([
        ['app.t1', 1, 1],
        ['app.v1', 1, 0],
        ['app.t2', 0, 0],
      ]);
    });

    it('should not cascade and should query each object once', async () => {
      const catalog = createScenarioCatalog();
      const resolver = new DependencyResolver(catalog);

      await resolver.summarize('app');

      expect(catalog.calls).toEqual([
        'listSchemaObjects:app',
        'directDependents:app.t1',
        'foreignKeyReferences:app.t1',
        'directDependents:app.v1',
        'foreignKeyReferences:app.v1',
        'directDependents:app.t2',
        'foreignKeyReferences:app.t2',
      ]);
    });

    it('should sort on request', async () => {
      const catalog = createScenarioCatalog();
      const resolver = new DependencyResolver(catalog);

      const byForeignKeys = await resolver.summarize('app', { sortBy: 'foreignKeys' });
      const byName = await resolver.summarize('app', { sortBy: 'name' });

      expect(byForeignKeys.map(row => row.object.name)).toEqual(['t1', 't2', 'v1']);
      expect(byName.map(row => row.object.name)).toEqual(['t1', 't2', 'v1']);
    });

    it('should return an empty summary for an empty schema', async () => {
      const resolver = new DependencyResolver(new FakeCatalogGateway());

      await expect(resolver.summarize('empty')).resolves.toEqual([]);
    });

    it('should propagate catalog failures without partial rows', async () => {
      const catalog = createScenarioCatalog().failOn('directDependents', 'app.v1');
      const resolver = new DependencyResolver(catalog);

      await expect(resolver.summarize('app')).rejects.toThrow(CatalogUnavailableError);
      expect(catalog.countCalls('directDependents', 'app.t2')).toBe(0);
    });
  });

  describe('sortSummaryRows', () => {
    it('should order by dependents descending with ties broken by name', () => {
      const catalog = createScenarioCatalog();
      const rows = [
        { object: catalog.get('app.t2'), dependentCount: 0, foreignKeyCount: 0 },
        { object: catalog.get('app.v1'), dependentCount: 1, foreignKeyCount: 0 },
        { object: catalog.get('app.t1'), dependentCount: 1, foreignKeyCount: 1 },
      ];

      const sorted = sortSummaryRows(rows, 'dependents');

      expect(sorted.map(row => row.object.name)).toEqual(['t1', 'v1', 't2']);
      expect(rows.map(row => row.object.name)).toEqual(['t2', 'v1', 't1']);
    });
  });
});
