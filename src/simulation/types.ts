import { GroundPoint, Obstacle, Vec3 } from "./geometry.js";

export enum AgentRole {
  Hider = "HIDER",
  Seeker = "SEEKER",
}

export enum SeekerBehavior {
  Patrol = "PATROL",
  Chase = "CHASE",
}

export enum HiderBehavior {
  Hide = "HIDE",
  Flee = "FLEE",
  Caught = "CAUGHT",
}

export type BehaviorState = SeekerBehavior | HiderBehavior;

export enum SessionPhase {
  Waiting = "WAITING",
  Active = "ACTIVE",
  Ended = "ENDED",
}

export enum Winner {
  Seekers = "SEEKERS",
  Hiders = "HIDERS",
}

export interface HidingSpot {
  position: Vec3;
  quality: number; // higher = better cover
  obstacleId: string;
}

/** Per-agent controller memory carried between ticks. */
export interface BehaviorMemory {
  target: Vec3 | null;
  sinceRetarget: number; // seconds since the throttled target last changed
  waypointIndex: number;
}

interface AgentBase {
  readonly id: number;
  position: Vec3; // last position reported by the motion module
  detected: boolean;
  caught: boolean;
  memory: BehaviorMemory;
}

export interface SeekerAgent extends AgentBase {
  readonly role: AgentRole.Seeker;
  behavior: SeekerBehavior;
}

export interface HiderAgent extends AgentBase {
  readonly role: AgentRole.Hider;
  behavior: HiderBehavior;
}

export type Agent = SeekerAgent | HiderAgent;

export interface AgentSpec {
  id: number;
  role: AgentRole;
}

/** Game rules consumed by the director and the behavior controllers. */
export interface GameRules {
  gameDuration: number;
  detectionRadius: number;
  catchRadius: number;
  seekerVisionRange: number;
  patrolUpdateInterval: number;
  hiderUpdateInterval: number;
  fleeDistance: number;
  fleeTriggerDistance: number;
}

export interface GameConfig extends GameRules {
  seekerCount: number;
  hiderCount: number;
  playAreaSize: number;
  numObstacles: number;
  obstacleSeed: string | number;
  hidingSpotCount: number;
}

export type GameEvent =
  | { type: "detected"; time: number; seekerId: number; hiderId: number }
  | { type: "caught"; time: number; seekerId: number; hiderId: number }
  | { type: "ended"; time: number; winner: Winner | null };

export interface AgentSnapshot {
  readonly id: number;
  readonly role: AgentRole;
  readonly position: Readonly<Vec3>;
  readonly target: Readonly<Vec3> | null;
  readonly behaviorState: BehaviorState;
  readonly detected: boolean;
  readonly caught: boolean;
}

export interface ObstacleSnapshot {
  readonly id: string;
  readonly minCorner: Readonly<GroundPoint>;
  readonly maxCorner: Readonly<GroundPoint>;
  readonly height: number;
}

export interface GameSnapshot {
  readonly tick: number;
  readonly phase: SessionPhase;
  readonly elapsedTime: number;
  readonly remainingTime: number;
  readonly caughtCount: number;
  readonly detectedCount: number;
  readonly uncaughtCount: number;
  readonly totalHiders: number;
  readonly winner: Winner | null;
  readonly agents: readonly AgentSnapshot[];
  readonly obstacles: readonly ObstacleSnapshot[];
  readonly events: readonly GameEvent[];
}

export function toObstacleSnapshot(obstacle: Obstacle): ObstacleSnapshot {
  return {
    id: obstacle.id,
    minCorner: { ...obstacle.min },
    maxCorner: { ...obstacle.max },
    height: obstacle.height,
  };
}
