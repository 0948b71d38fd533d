import { z } from "zod";
import { Vec3 } from "./geometry.js";
import {
  AgentRole,
  GameEvent,
  GameSnapshot,
  HiderBehavior,
  SeekerBehavior,
  SessionPhase,
  Winner,
} from "./types.js";

const WireVec3 = z.tuple([z.number(), z.number(), z.number()]);
const WireGroundPoint = z.tuple([z.number(), z.number()]);

const WireEvent = z.discriminatedUnion("type", [
  z.object({ type: z.literal("detected"), time: z.number(), seeker_id: z.number().int(), hider_id: z.number().int() }),
  z.object({ type: z.literal("caught"), time: z.number(), seeker_id: z.number().int(), hider_id: z.number().int() }),
  z.object({ type: z.literal("ended"), time: z.number(), winner: z.nativeEnum(Winner).nullable() }),
]);

/** Fixed wire schema for per-tick state broadcast to renderers and recorders. */
export const TelemetryFrameSchema = z.object({
  tick: z.number().int().nonnegative(),
  phase: z.nativeEnum(SessionPhase),
  elapsed_time: z.number().nonnegative(),
  remaining_time: z.number().nonnegative(),
  caught_count: z.number().int().nonnegative(),
  detected_count: z.number().int().nonnegative(),
  total_hiders: z.number().int().nonnegative(),
  winner: z.nativeEnum(Winner).nullable(),
  agents: z.array(
    z.object({
      id: z.number().int().nonnegative(),
      role: z.nativeEnum(AgentRole),
      position: WireVec3,
      target: WireVec3.nullable(),
      behavior_state: z.union([z.nativeEnum(SeekerBehavior), z.nativeEnum(HiderBehavior)]),
      detected: z.boolean(),
      caught: z.boolean(),
    }),
  ),
  obstacles: z.array(
    z.object({
      id: z.string(),
      min_corner: WireGroundPoint,
      max_corner: WireGroundPoint,
      height: z.number().positive(),
    }),
  ),
  events: z.array(WireEvent),
});

export type TelemetryFrame = z.infer<typeof TelemetryFrameSchema>;

function wireVec(v: Readonly<Vec3>): [number, number, number] {
  return [v.x, v.y, v.z];
}

function wireEvent(event: GameEvent): z.infer<typeof WireEvent> {
  if (event.type === "ended") {
    return { type: "ended", time: event.time, winner: event.winner };
  }
  return { type: event.type, time: event.time, seeker_id: event.seekerId, hider_id: event.hiderId };
}

export function toTelemetryFrame(snapshot: GameSnapshot): TelemetryFrame {
  return TelemetryFrameSchema.parse({
    tick: snapshot.tick,
    phase: snapshot.phase,
    elapsed_time: snapshot.elapsedTime,
    remaining_time: snapshot.remainingTime,
    caught_count: snapshot.caughtCount,
    detected_count: snapshot.detectedCount,
    total_hiders: snapshot.totalHiders,
    winner: snapshot.winner,
    agents: snapshot.agents.map((a) => ({
      id: a.id,
      role: a.role,
      position: wireVec(a.position),
      target: a.target ? wireVec(a.target) : null,
      behavior_state: a.behaviorState,
      detected: a.detected,
      caught: a.caught,
    })),
    obstacles: snapshot.obstacles.map((o) => ({
      id: o.id,
      min_corner: [o.minCorner.x, o.minCorner.z],
      max_corner: [o.maxCorner.x, o.maxCorner.z],
      height: o.height,
    })),
    events: snapshot.events.map(wireEvent),
  });
}

export function encodeTelemetryFrame(snapshot: GameSnapshot): string {
  return JSON.stringify(toTelemetryFrame(snapshot));
}

export function parseTelemetryFrame(raw: string): TelemetryFrame {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Telemetry frame is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  const result = TelemetryFrameSchema.safeParse(data);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid telemetry frame: ${detail}`);
  }
  return result.data;
}
