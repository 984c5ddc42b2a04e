import { describe, it, expect } from 'vitest';
import { DependencyResolver, resolveDeploymentOrder } from '../stage-resolver.js';
import { isStackctlError } from '../../errors/index.js';

type TestStage = { name: string; imports: string[]; exports: string[]; dependsOn: string[] };

const stage = (name: string, fields: Partial<Omit<TestStage, 'name'>> = {}): TestStage => ({
  name,
  imports: [],
  exports: [],
  dependsOn: [],
  ...fields,
});

const errorCode = (run: () => unknown): string | undefined => {
  try {
    run();
  } catch (error) {
    return isStackctlError(error) ? error.code : 'NOT_A_STACKCTL_ERROR';
  }
  return undefined;
};

const shopStages = (): TestStage[] => [
  stage('pipeline', { imports: ['shop-container-ClusterName', 'shop-service-ServiceName'] }),
  stage('service', {
    imports: ['shop-network-VpcId', 'shop-container-ClusterName'],
    exports: ['shop-service-ServiceName'],
  }),
  stage('container', { imports: ['shop-network-VpcId'], exports: ['shop-container-ClusterName'] }),
  stage('network', { exports: ['shop-network-VpcId'] }),
];

describe('DependencyResolver', () => {
  it('should order stages by the exports they import', () => {
    const resolved = resolveDeploymentOrder(shopStages());

    expect(resolved.order).toEqual(['network', 'container', 'service', 'pipeline']);
    expect(resolved.teardownOrder).toEqual(['pipeline', 'service', 'container', 'network']);
    expect(resolved.producers.get('shop-network-VpcId')).toBe('network');
  });

  it('should explain every edge', () => {
    const { edges } = resolveDeploymentOrder(shopStages());

    expect(edges).toEqual([
      { from: 'container', to: 'pipeline', reason: 'import shop-container-ClusterName' },
      { from: 'service', to: 'pipeline', reason: 'import shop-service-ServiceName' },
      { from: 'network', to: 'service', reason: 'import shop-network-VpcId' },
      { from: 'container', to: 'service', reason: 'import shop-container-ClusterName' },
      { from: 'network', to: 'container', reason: 'import shop-network-VpcId' },
    ]);
  });

  it('should add depends_on edges', () => {
    const { order, edges } = resolveDeploymentOrder([
      stage('dashboard', { dependsOn: ['alarms'] }),
      stage('alarms'),
    ]);

    expect(order).toEqual(['alarms', 'dashboard']);
    expect(edges).toEqual([{ from: 'alarms', to: 'dashboard', reason: 'depends_on' }]);
  });

  it('should keep declaration order for independent stages', () => {
    const { order } = resolveDeploymentOrder([stage('b'), stage('a'), stage('c')]);

    expect(order).toEqual(['b', 'a', 'c']);
  });

  it('should reject imports that nothing exports', () => {
    const stages = [stage('container', { imports: ['shop-network-VpcId'] })];

    expect(errorCode(() => resolveDeploymentOrder(stages))).toBe('UNRESOLVED_IMPORT');
    expect(() => resolveDeploymentOrder(stages)).toThrow(
      'Stage container imports shop-network-VpcId, which no stage exports'
    );
  });

  it('should accept imports of exports that exist outside the project', () => {
    const stages = [stage('container', { imports: ['shared-VpcId'] })];

    const resolved = resolveDeploymentOrder(stages, { externalExports: new Set(['shared-VpcId']) });

    expect(resolved.order).toEqual(['container']);
    expect(resolved.externalImports.get('container')).toEqual(['shared-VpcId']);
    expect(resolved.edges).toEqual([]);
  });

  it('should prefer a project stage over an external export of the same name', () => {
    const stages = [
      stage('network', { exports: ['shop-network-VpcId'] }),
      stage('container', { imports: ['shop-network-VpcId'] }),
    ];

    const resolved = resolveDeploymentOrder(stages, { externalExports: new Set(['shop-network-VpcId']) });

    expect(resolved.externalImports.size).toBe(0);
    expect(resolved.edges).toHaveLength(1);
  });

  it('should reject an export produced by two stages', () => {
    const stages = [stage('a', { exports: ['VpcId'] }), stage('b', { exports: ['VpcId'] })];

    expect(errorCode(() => resolveDeploymentOrder(stages))).toBe('DUPLICATE_EXPORT');
    expect(() => resolveDeploymentOrder(stages)).toThrow('Export VpcId is produced by both a and b');
  });

  it('should reject a stage importing its own export', () => {
    const stages = [stage('network', { imports: ['VpcId'], exports: ['VpcId'] })];

    expect(errorCode(() => resolveDeploymentOrder(stages))).toBe('SELF_IMPORT');
  });

  it('should reject depends_on entries naming unknown stages', () => {
    const stages = [stage('service', { dependsOn: ['database'] })];

    expect(errorCode(() => resolveDeploymentOrder(stages))).toBe('UNKNOWN_DEPENDENCY');
    expect(() => resolveDeploymentOrder(stages)).toThrow('Stage service depends on unknown stage database');
  });

  it('should report a cycle with its path', () => {
    const stages = [stage('a', { dependsOn: ['b'] }), stage('b', { dependsOn: ['a'] })];

    expect(errorCode(() => resolveDeploymentOrder(stages))).toBe('DEPENDENCY_CYCLE');
    expect(() => resolveDeploymentOrder(stages)).toThrow('Dependency cycle detected: a -> b -> a');
  });

  describe('selectStages', () => {
    const resolver = new DependencyResolver(shopStages());

    it('should return the selection in deployment order', () => {
      expect(resolver.selectStages(['pipeline', 'network'])).toEqual(['network', 'pipeline']);
    });

    it('should add dependencies on request', () => {
      expect(resolver.selectStages(['service'], true)).toEqual(['network', 'container', 'service']);
    });

    it('should reject unknown stage names', () => {
      expect(errorCode(() => resolver.selectStages(['database']))).toBe('UNKNOWN_STAGE');
      expect(() => resolver.selectStages(['database'])).toThrow('Unknown stage: database');
    });
  });

  it('should list transitive dependents and dependencies', () => {
    const resolver = new DependencyResolver(shopStages());

    expect(resolver.dependentsOf('container').sort()).toEqual(['pipeline', 'service']);
    expect(resolver.dependenciesOf('pipeline').sort()).toEqual(['container', 'network', 'service']);
  });
});
