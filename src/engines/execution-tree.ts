import {
  createNodeLifecycle,
  type LifecycleStep,
  type NodeLifecycleTransition,
  type StatusLifecycle,
} from './status-lifecycle.engine';
import {
  eventPhase,
  type NodeDescriptor,
  type NodeStatus,
  type NodeType,
  type TelemetryEvent,
} from '../interfaces/telemetry-event.interface';
import type {
  DisplayNode,
  ExecutionStats,
  NodeFlag,
  PathElement,
} from '../interfaces/display-tree.interface';
import type {
  EventRejection,
  RejectionReason,
} from '../interfaces/run.interface';
import { statesChanged } from '../utils/active-states';

interface TreeNode {
  id: string;
  descriptor: NodeDescriptor | null;
  lifecycle: StatusLifecycle<NodeLifecycleTransition, NodeStatus>;
  parentId: string | null;
  /** False for placeholders: the parent is not known until the node's own event. */
  parentKnown: boolean;
  children: string[];
  firstSeenSequence: number;
  startedAt: number | null;
  endedAt: number | null;
  error: string | null;
  flags: Set<NodeFlag>;
  screenshotRef: string | null;
}

export interface ApplyContext {
  /** The event was released past a declared sequence gap. */
  orderingGap: boolean;
}

export interface AppliedNode {
  nodeId: string;
  nodeType: NodeType;
  status: NodeStatus;
  durationMs: number | null;
  isRoot: boolean;
}

export type ApplyOutcome =
  | {
      accepted: true;
      node: AppliedNode;
      statesChanged: boolean;
      statusChange: LifecycleStep<NodeStatus> | null;
    }
  | { accepted: false; rejection: EventRejection };

export interface TreeMaterialization {
  rootNodes: DisplayNode[];
  rootStatus: NodeStatus;
  durationMs: number | null;
  totalEvents: number;
}

function durationOf(node: TreeNode): number | null {
  if (node.startedAt === null || node.endedAt === null) return null;
  return node.endedAt - node.startedAt;
}

/**
 * Arena of nodes for one run, keyed by node id. Parent links always form a
 * forest: assignments that would close a cycle are rejected.
 */
export class ExecutionTree {
  private readonly nodes = new Map<string, TreeNode>();
  private rootId: string | null = null;
  private appliedEvents = 0;
  private stateChangeEvents = 0;
  private placeholders = 0;

  constructor(
    public readonly runId: string,
    private readonly maxPendingPlaceholders: number,
  ) {}

  get root(): string | null {
    return this.rootId;
  }

  get totalEvents(): number {
    return this.appliedEvents;
  }

  get stateChanges(): number {
    return this.stateChangeEvents;
  }

  /** Nodes whose parent link is still unknown. */
  get placeholderCount(): number {
    return this.placeholders;
  }

  hasNode(nodeId: string): boolean {
    return this.nodes.has(nodeId);
  }

  statusOf(nodeId: string): NodeStatus | null {
    return this.nodes.get(nodeId)?.lifecycle.status ?? null;
  }

  statusHistoryOf(nodeId: string): NodeStatus[] {
    return this.nodes.get(nodeId)?.lifecycle.statusHistory ?? [];
  }

  durationOf(nodeId: string): number | null {
    const node = this.nodes.get(nodeId);
    return node ? durationOf(node) : null;
  }

  apply(event: TelemetryEvent, context: ApplyContext): ApplyOutcome {
    const violation = this.validate(event);
    if (violation) {
      return {
        accepted: false,
        rejection: {
          eventId: event.eventId,
          sequence: event.sequence,
          nodeId: event.nodeId,
          reason: violation.reason,
          detail: violation.detail,
        },
      };
    }

    const node = this.materialize(event);
    const statusChange = this.advance(node, event);

    if (context.orderingGap) {
      node.flags.add('ordering_gap');
    }
    if (event.screenshotRef) {
      node.screenshotRef = event.screenshotRef;
    }

    const changed = statesChanged(
      event.activeStatesBefore,
      event.activeStatesAfter,
    );
    this.appliedEvents += 1;
    if (changed) this.stateChangeEvents += 1;

    return {
      accepted: true,
      node: {
        nodeId: node.id,
        nodeType: event.node.type,
        status: node.lifecycle.status,
        durationMs: durationOf(node),
        isRoot: node.id === this.rootId,
      },
      statesChanged: changed,
      statusChange,
    };
  }

  /**
   * Fail the root if it has not reached a terminal status yet. Other nodes
   * keep whatever status they last had.
   */
  forceTerminateRoot(reason: string, timestamp: number): boolean {
    const root = this.rootId ? this.nodes.get(this.rootId) : undefined;
    if (!root || !root.lifecycle.fire('fail')) {
      return false;
    }
    root.endedAt = timestamp;
    root.error = reason;
    return true;
  }

  materializeTree(): TreeMaterialization {
    const rootNodes: DisplayNode[] = [];
    const root = this.rootId ? this.nodes.get(this.rootId) : undefined;
    if (root) {
      rootNodes.push(this.toDisplayNode(root, 0));
    }

    const detached = [...this.nodes.values()]
      .filter((node) => !node.parentKnown)
      .sort((a, b) => a.firstSeenSequence - b.firstSeenSequence);
    for (const node of detached) {
      rootNodes.push(this.toDisplayNode(node, 0));
    }

    return {
      rootNodes,
      rootStatus: root?.lifecycle.status ?? 'pending',
      durationMs: root ? durationOf(root) : null,
      totalEvents: this.appliedEvents,
    };
  }

  describeNode(nodeId: string): DisplayNode | null {
    const node = this.nodes.get(nodeId);
    return node ? this.toDisplayNode(node, this.depthOf(node)) : null;
  }

  /** Path from the topmost known ancestor down to the node. */
  pathTo(nodeId: string): PathElement[] {
    const path: PathElement[] = [];
    let current = this.nodes.get(nodeId);
    while (current) {
      path.push({
        id: current.id,
        name: current.descriptor?.name ?? current.id,
        nodeType: current.descriptor?.type ?? null,
      });
      current =
        current.parentKnown && current.parentId
          ? this.nodes.get(current.parentId)
          : undefined;
    }
    return path.reverse();
  }

  executionStats(): ExecutionStats {
    let totalActions = 0;
    let successfulActions = 0;
    let failedActions = 0;
    let runningActions = 0;
    let durationSum = 0;
    let durationCount = 0;

    for (const node of this.nodes.values()) {
      if (node.descriptor?.type !== 'action') continue;
      totalActions++;
      const status = node.lifecycle.status;
      if (status === 'success') successfulActions++;
      else if (status === 'failed') failedActions++;
      else if (status === 'running') runningActions++;

      const duration = durationOf(node);
      if (duration !== null) {
        durationSum += duration;
        durationCount++;
      }
    }

    const root = this.rootId ? this.nodes.get(this.rootId) : undefined;
    return {
      totalActions,
      successfulActions,
      failedActions,
      runningActions,
      totalDurationMs: root ? durationOf(root) : null,
      avgActionDurationMs:
        durationCount > 0 ? durationSum / durationCount : null,
    };
  }

  private validate(
    event: TelemetryEvent,
  ): { reason: RejectionReason; detail: string } | null {
    const existing = this.nodes.get(event.nodeId);
    const phase = eventPhase(event.eventType);

    if (
      event.parentNodeId === null &&
      this.rootId !== null &&
      this.rootId !== event.nodeId
    ) {
      return {
        reason: 'duplicate_root',
        detail: `run already has root ${this.rootId}; ${event.nodeId} has no parent`,
      };
    }

    if (existing?.parentKnown && existing.parentId !== event.parentNodeId) {
      return {
        reason: 'parent_mismatch',
        detail: `node ${event.nodeId} belongs to ${String(existing.parentId)}, event names ${String(event.parentNodeId)}`,
      };
    }

    if (existing && existing.parentKnown) {
      if (phase === 'started') {
        const status = existing.lifecycle.status;
        if (status === 'running' || existing.startedAt !== null) {
          return {
            reason: 'duplicate_start',
            detail: `node ${event.nodeId} already started (status ${status})`,
          };
        }
      } else if (existing.lifecycle.isFinal()) {
        return {
          reason: 'terminal_status_overwrite',
          detail: `node ${event.nodeId} is already ${existing.lifecycle.status}`,
        };
      }
      return null;
    }

    // New node, or a placeholder receiving its own event: its parent link is set now.
    if (event.parentNodeId === null) {
      return null;
    }

    if (!this.nodes.has(event.parentNodeId)) {
      const filling = existing ? 1 : 0;
      if (this.placeholderCount - filling + 1 > this.maxPendingPlaceholders) {
        return {
          reason: 'orphaned_parent',
          detail: `parent ${event.parentNodeId} of ${event.nodeId} is unknown and ${this.placeholderCount} placeholder(s) are already pending`,
        };
      }
      return null;
    }

    if (existing && this.isAncestorOrSelf(event.nodeId, event.parentNodeId)) {
      return {
        reason: 'cycle_detected',
        detail: `attaching ${event.nodeId} under ${event.parentNodeId} would create a cycle`,
      };
    }

    return null;
  }

  private materialize(event: TelemetryEvent): TreeNode {
    const existing = this.nodes.get(event.nodeId);
    if (existing?.parentKnown) {
      return existing;
    }

    const node = existing ?? this.createNode(event.nodeId, event.sequence);
    node.descriptor = event.node;
    node.parentKnown = true;
    this.placeholders -= 1;
    node.parentId = event.parentNodeId;

    if (event.parentNodeId === null) {
      this.rootId = node.id;
    } else {
      const parent =
        this.nodes.get(event.parentNodeId) ??
        this.createNode(event.parentNodeId, event.sequence);
      this.attachChild(parent, node);
    }

    return node;
  }

  private advance(
    node: TreeNode,
    event: TelemetryEvent,
  ): LifecycleStep<NodeStatus> | null {
    const phase = eventPhase(event.eventType);

    if (phase === 'started') {
      node.startedAt = event.timestamp;
      // A node first seen through its terminal event keeps that status.
      return node.lifecycle.fire('start');
    }

    node.endedAt = event.timestamp;
    if (phase === 'failed') {
      node.error = event.error?.message ?? 'failed';
      return node.lifecycle.fire('fail');
    }
    return node.lifecycle.fire('succeed');
  }

  private createNode(id: string, firstSeenSequence: number): TreeNode {
    const node: TreeNode = {
      id,
      descriptor: null,
      lifecycle: createNodeLifecycle(),
      parentId: null,
      parentKnown: false,
      children: [],
      firstSeenSequence,
      startedAt: null,
      endedAt: null,
      error: null,
      flags: new Set<NodeFlag>(),
      screenshotRef: null,
    };
    this.nodes.set(id, node);
    this.placeholders += 1;
    return node;
  }

  private attachChild(parent: TreeNode, child: TreeNode): void {
    if (parent.children.includes(child.id)) return;

    const index = parent.children.findIndex((siblingId) => {
      const sibling = this.nodes.get(siblingId);
      return (
        sibling !== undefined &&
        sibling.firstSeenSequence > child.firstSeenSequence
      );
    });
    if (index === -1) {
      parent.children.push(child.id);
    } else {
      parent.children.splice(index, 0, child.id);
    }
  }

  /** Whether walking up from `startId` reaches `nodeId`. */
  private isAncestorOrSelf(nodeId: string, startId: string): boolean {
    let current = this.nodes.get(startId);
    const visited = new Set<string>();
    while (current && !visited.has(current.id)) {
      if (current.id === nodeId) return true;
      visited.add(current.id);
      current =
        current.parentKnown && current.parentId
          ? this.nodes.get(current.parentId)
          : undefined;
    }
    return false;
  }

  private depthOf(node: TreeNode): number {
    return this.pathTo(node.id).length - 1;
  }

  private toDisplayNode(node: TreeNode, level: number): DisplayNode {
    const children: DisplayNode[] = [];
    for (const childId of node.children) {
      const child = this.nodes.get(childId);
      if (child) {
        children.push(this.toDisplayNode(child, level + 1));
      }
    }

    return {
      id: node.id,
      nodeType: node.descriptor?.type ?? null,
      name: node.descriptor?.name ?? node.id,
      status: node.lifecycle.status,
      descriptor: node.descriptor ? { ...node.descriptor } : null,
      startedAt: node.startedAt,
      endedAt: node.endedAt,
      durationMs: durationOf(node),
      error: node.error,
      level,
      placeholder: !node.parentKnown,
      flags: [...node.flags].sort(),
      screenshotRef: node.screenshotRef,
      children,
    };
  }
}
