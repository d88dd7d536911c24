import { z } from 'zod';
import {
  TREE_EVENT_TYPES,
  eventNodeType,
  type TelemetryEvent,
} from '../interfaces/telemetry-event.interface';

const nonEmpty = z.string().min(1);

const nodeDescriptorSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('workflow'),
    name: z.string(),
    workflowId: nonEmpty.optional(),
  }),
  z.object({
    type: z.literal('action'),
    name: z.string(),
    actionType: z.string().optional(),
  }),
  z.object({
    type: z.literal('transition'),
    name: z.string(),
    transitionId: nonEmpty,
    fromState: z.string().optional(),
    toState: z.string().optional(),
  }),
]);

export const telemetryEventSchema: z.ZodType<
  TelemetryEvent,
  z.ZodTypeDef,
  unknown
> = z
  .object({
    eventId: nonEmpty,
    runId: nonEmpty,
    sequence: z.number().int().nonnegative(),
    eventType: z.enum(TREE_EVENT_TYPES),
    nodeId: nonEmpty,
    node: nodeDescriptorSchema,
    parentNodeId: nonEmpty.nullable(),
    timestamp: z.number().finite().nonnegative(),
    durationMs: z.number().finite().nonnegative().optional(),
    error: z
      .object({
        message: z.string(),
        type: nonEmpty.optional(),
      })
      .optional(),
    activeStatesBefore: z.array(z.string()),
    activeStatesAfter: z.array(z.string()),
    screenshotRef: nonEmpty.optional(),
  })
  .superRefine((event, ctx) => {
    if (eventNodeType(event.eventType) !== event.node.type) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['node', 'type'],
        message: `node type "${event.node.type}" does not match event type "${event.eventType}"`,
      });
    }
    if (event.parentNodeId === event.nodeId) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['parentNodeId'],
        message: 'node cannot be its own parent',
      });
    }
  });

export type ParsedEvent =
  | { ok: true; event: TelemetryEvent }
  | { ok: false; eventId: string | null; sequence: number | null; detail: string };

function readField(input: unknown, key: string): unknown {
  if (typeof input !== 'object' || input === null) return undefined;
  return Object.getOwnPropertyDescriptor(input, key)?.value;
}

export function parseTelemetryEvent(input: unknown): ParsedEvent {
  const result = telemetryEventSchema.safeParse(input);
  if (result.success) {
    return { ok: true, event: result.data };
  }

  const eventId = readField(input, 'eventId');
  const sequence = readField(input, 'sequence');
  return {
    ok: false,
    eventId: typeof eventId === 'string' ? eventId : null,
    sequence: typeof sequence === 'number' ? sequence : null,
    detail: result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; '),
  };
}
