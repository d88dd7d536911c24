import { ExecutionTree } from '../../src/engines/execution-tree';
import { buildEvent, nestedRunEvents } from '../helpers';

const inOrder = { orderingGap: false };

function applyAll(tree: ExecutionTree, events = nestedRunEvents()) {
  return events.map((event) => tree.apply(event, inOrder));
}

describe('ExecutionTree', () => {
  let tree: ExecutionTree;

  beforeEach(() => {
    tree = new ExecutionTree('run-1', 1);
  });

  it('should build a nested tree from in-order events', () => {
    const outcomes = applyAll(tree);

    expect(outcomes.every((outcome) => outcome.accepted)).toBe(true);

    const materialized = tree.materializeTree();
    expect(materialized.rootStatus).toBe('success');
    expect(materialized.durationMs).toBe(500);
    expect(materialized.totalEvents).toBe(4);
    expect(materialized.rootNodes).toHaveLength(1);

    const [root] = materialized.rootNodes;
    expect(root.id).toBe('w');
    expect(root.level).toBe(0);
    expect(root.nodeType).toBe('workflow');
    expect(root.children.map((child) => [child.id, child.status, child.level])).toEqual([
      ['a1', 'success', 1],
    ]);
    expect(root.children[0].durationMs).toBe(300);
  });

  it('should report the root as the applied node for root events', () => {
    const [first] = applyAll(tree, nestedRunEvents().slice(0, 1));

    expect(first).toEqual({
      accepted: true,
      node: {
        nodeId: 'w',
        nodeType: 'workflow',
        status: 'running',
        durationMs: null,
        isRoot: true,
      },
      statesChanged: false,
      statusChange: { from: 'pending', to: 'running' },
    });
  });

  it('should keep a terminal status when the start event arrives later', () => {
    tree.apply(buildEvent({ seq: 1, type: 'workflow_started', node: 'w', parent: null }), inOrder);
    tree.apply(
      buildEvent({ seq: 3, type: 'action_completed', node: 'a1', parent: 'w', at: 1400 }),
      { orderingGap: true },
    );
    const late = tree.apply(
      buildEvent({ seq: 2, type: 'action_started', node: 'a1', parent: 'w', at: 1100 }),
      { orderingGap: true },
    );

    expect(late.accepted).toBe(true);
    expect(tree.statusOf('a1')).toBe('success');
    expect(tree.durationOf('a1')).toBe(300);
    expect(tree.describeNode('a1')?.flags).toEqual(['ordering_gap']);
  });

  it('should reject a status change out of a terminal status', () => {
    tree.apply(buildEvent({ seq: 1, type: 'workflow_started', node: 'w', parent: null }), inOrder);
    tree.apply(buildEvent({ seq: 2, type: 'transition_started', node: 't1', parent: 'w' }), inOrder);
    tree.apply(
      buildEvent({
        seq: 3,
        type: 'transition_failed',
        node: 't1',
        parent: 'w',
        error: { message: 'element not found', type: 'element_not_found' },
      }),
      inOrder,
    );

    const overwrite = tree.apply(
      buildEvent({ seq: 4, type: 'transition_completed', node: 't1', parent: 'w' }),
      inOrder,
    );

    expect(overwrite).toEqual({
      accepted: false,
      rejection: {
        eventId: 'evt-4',
        sequence: 4,
        nodeId: 't1',
        reason: 'terminal_status_overwrite',
        detail: 'node t1 is already failed',
      },
    });
    expect(tree.statusOf('t1')).toBe('failed');
    expect(tree.describeNode('t1')?.error).toBe('element not found');
    expect(tree.statusHistoryOf('t1')).toEqual(['pending', 'running', 'failed']);
  });

  it('should reject a second start of the same node', () => {
    applyAll(tree, nestedRunEvents().slice(0, 2));

    const again = tree.apply(
      buildEvent({ seq: 3, type: 'action_started', node: 'a1', parent: 'w' }),
      inOrder,
    );

    expect(again.accepted).toBe(false);
    if (!again.accepted) {
      expect(again.rejection.reason).toBe('duplicate_start');
    }
    expect(tree.statusOf('a1')).toBe('running');
  });

  it('should reject a second root', () => {
    applyAll(tree, nestedRunEvents().slice(0, 1));

    const second = tree.apply(
      buildEvent({ seq: 2, type: 'workflow_started', node: 'w2', parent: null }),
      inOrder,
    );

    expect(second.accepted).toBe(false);
    if (!second.accepted) {
      expect(second.rejection.reason).toBe('duplicate_root');
    }
    expect(tree.root).toBe('w');
  });

  it('should reject an event that names a different parent', () => {
    applyAll(tree, nestedRunEvents().slice(0, 2));
    tree.apply(buildEvent({ seq: 3, type: 'action_started', node: 'a2', parent: 'w' }), inOrder);

    const moved = tree.apply(
      buildEvent({ seq: 4, type: 'action_completed', node: 'a1', parent: 'a2' }),
      inOrder,
    );

    expect(moved.accepted).toBe(false);
    if (!moved.accepted) {
      expect(moved.rejection.reason).toBe('parent_mismatch');
      expect(moved.rejection.detail).toBe('node a1 belongs to w, event names a2');
    }
  });

  describe('placeholders', () => {
    beforeEach(() => {
      tree.apply(buildEvent({ seq: 1, type: 'workflow_started', node: 'w', parent: null }), inOrder);
    });

    it('should hold a child of an unknown parent under a detached placeholder', () => {
      const outcome = tree.apply(
        buildEvent({ seq: 3, type: 'action_started', node: 'a2', parent: 'a1' }),
        inOrder,
      );

      expect(outcome.accepted).toBe(true);
      expect(tree.placeholderCount).toBe(1);

      const { rootNodes } = tree.materializeTree();
      expect(rootNodes.map((node) => [node.id, node.placeholder])).toEqual([
        ['w', false],
        ['a1', true],
      ]);
      expect(rootNodes[1].status).toBe('pending');
      expect(rootNodes[1].nodeType).toBeNull();
      expect(rootNodes[1].children.map((node) => node.id)).toEqual(['a2']);
    });

    it('should attach the placeholder once its own event arrives', () => {
      tree.apply(buildEvent({ seq: 3, type: 'action_started', node: 'a2', parent: 'a1' }), inOrder);
      const filled = tree.apply(
        buildEvent({ seq: 2, type: 'action_started', node: 'a1', parent: 'w' }),
        { orderingGap: true },
      );

      expect(filled.accepted).toBe(true);
      expect(tree.placeholderCount).toBe(0);

      const { rootNodes } = tree.materializeTree();
      expect(rootNodes).toHaveLength(1);
      expect(rootNodes[0].children[0].id).toBe('a1');
      expect(rootNodes[0].children[0].children[0]).toMatchObject({
        id: 'a2',
        level: 2,
      });
      expect(tree.pathTo('a2')).toEqual([
        { id: 'w', name: 'w', nodeType: 'workflow' },
        { id: 'a1', name: 'a1', nodeType: 'action' },
        { id: 'a2', name: 'a2', nodeType: 'action' },
      ]);
    });

    it('should reject an orphan once too many placeholders are pending', () => {
      tree.apply(buildEvent({ seq: 2, type: 'action_started', node: 'a2', parent: 'p1' }), inOrder);

      const orphan = tree.apply(
        buildEvent({ seq: 3, type: 'action_started', node: 'a3', parent: 'p2' }),
        inOrder,
      );

      expect(orphan.accepted).toBe(false);
      if (!orphan.accepted) {
        expect(orphan.rejection.reason).toBe('orphaned_parent');
      }
      expect(tree.hasNode('p2')).toBe(false);
    });

    it('should count placeholders as they are created and filled', () => {
      const wide = new ExecutionTree('run-1', 2);
      const counts = [
        buildEvent({ seq: 1, type: 'workflow_started', node: 'w', parent: null }),
        buildEvent({ seq: 4, type: 'action_started', node: 'a2', parent: 'p1' }),
        buildEvent({ seq: 5, type: 'action_started', node: 'a3', parent: 'p2' }),
        buildEvent({ seq: 2, type: 'action_started', node: 'p1', parent: 'w' }),
        buildEvent({ seq: 3, type: 'action_started', node: 'p2', parent: 'w' }),
        buildEvent({ seq: 6, type: 'action_started', node: 'a4', parent: 'w' }),
      ].map((event) => {
        wide.apply(event, inOrder);
        return wide.placeholderCount;
      });

      expect(counts).toEqual([0, 1, 2, 1, 0, 0]);
    });

    it('should reject a parent link that closes a cycle', () => {
      tree.apply(buildEvent({ seq: 2, type: 'action_started', node: 'x', parent: 'y' }), inOrder);

      const cycle = tree.apply(
        buildEvent({ seq: 3, type: 'action_started', node: 'y', parent: 'x' }),
        inOrder,
      );

      expect(cycle.accepted).toBe(false);
      if (!cycle.accepted) {
        expect(cycle.rejection.reason).toBe('cycle_detected');
      }
      expect(tree.placeholderCount).toBe(1);
    });
  });

  it('should order siblings by the sequence they were first seen at', () => {
    tree.apply(buildEvent({ seq: 1, type: 'workflow_started', node: 'w', parent: null }), inOrder);
    tree.apply(buildEvent({ seq: 5, type: 'action_started', node: 'late', parent: 'w' }), inOrder);
    tree.apply(buildEvent({ seq: 2, type: 'action_started', node: 'early', parent: 'w' }), inOrder);

    const [root] = tree.materializeTree().rootNodes;
    expect(root.children.map((child) => child.id)).toEqual(['early', 'late']);
  });

  it('should flag nodes released past a sequence gap', () => {
    tree.apply(buildEvent({ seq: 1, type: 'workflow_started', node: 'w', parent: null }), inOrder);
    tree.apply(buildEvent({ seq: 3, type: 'action_started', node: 'a1', parent: 'w' }), {
      orderingGap: true,
    });

    expect(tree.describeNode('a1')?.flags).toEqual(['ordering_gap']);
    expect(tree.describeNode('w')?.flags).toEqual([]);
  });

  it('should count events that change the active states', () => {
    const outcome = tree.apply(
      buildEvent({
        seq: 1,
        type: 'workflow_started',
        node: 'w',
        parent: null,
        before: ['cart'],
        after: ['payment'],
      }),
      inOrder,
    );

    expect(outcome.accepted && outcome.statesChanged).toBe(true);
    expect(tree.stateChanges).toBe(1);
  });

  it('should keep the screenshot reference of the latest event', () => {
    tree.apply(
      buildEvent({ seq: 1, type: 'workflow_started', node: 'w', parent: null, screenshotRef: 'shot-1' }),
      inOrder,
    );

    expect(tree.describeNode('w')?.screenshotRef).toBe('shot-1');
  });

  describe('forceTerminateRoot', () => {
    it('should fail a running root and leave its children alone', () => {
      applyAll(tree, nestedRunEvents().slice(0, 2));

      expect(tree.forceTerminateRoot('Run cancelled', 2000)).toBe(true);
      expect(tree.statusOf('w')).toBe('failed');
      expect(tree.statusOf('a1')).toBe('running');
      expect(tree.describeNode('w')).toMatchObject({
        endedAt: 2000,
        error: 'Run cancelled',
        durationMs: 1000,
      });
    });

    it('should do nothing to a finished root', () => {
      applyAll(tree);

      expect(tree.forceTerminateRoot('Run cancelled', 2000)).toBe(false);
      expect(tree.statusOf('w')).toBe('success');
    });

    it('should do nothing without a root', () => {
      expect(tree.forceTerminateRoot('Run cancelled', 2000)).toBe(false);
    });
  });

  it('should compute execution stats over action nodes', () => {
    applyAll(tree, nestedRunEvents().slice(0, 3));
    tree.apply(buildEvent({ seq: 4, type: 'action_started', node: 'a2', parent: 'w', at: 1500 }), inOrder);
    tree.apply(
      buildEvent({ seq: 5, type: 'action_failed', node: 'a2', parent: 'w', at: 1600 }),
      inOrder,
    );
    tree.apply(buildEvent({ seq: 6, type: 'action_started', node: 'a3', parent: 'w', at: 1700 }), inOrder);

    expect(tree.executionStats()).toEqual({
      totalActions: 3,
      successfulActions: 1,
      failedActions: 1,
      runningActions: 1,
      totalDurationMs: null,
      avgActionDurationMs: 200,
    });
  });

  it('should return an empty path for unknown nodes', () => {
    expect(tree.pathTo('missing')).toEqual([]);
    expect(tree.describeNode('missing')).toBeNull();
  });
});
