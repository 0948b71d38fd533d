import {
  BehaviorContext,
  CONTROLLERS,
  Sighting,
  initialHiderBehavior,
  initialMemory,
  initialSeekerBehavior,
  nextHiderBehavior,
  patrolWaypoints,
} from "./behavior.js";
import { parseGameConfig, parseGameRules, rulesOf } from "./config.js";
import { Environment } from "./Environment.js";
import { ConfigurationError } from "./errors.js";
import { Vec3, distance } from "./geometry.js";
import {
  Agent,
  AgentRole,
  AgentSnapshot,
  AgentSpec,
  GameEvent,
  GameRules,
  GameSnapshot,
  HiderAgent,
  HiderBehavior,
  SeekerAgent,
  SessionPhase,
  Winner,
  toObstacleSnapshot,
} from "./types.js";
import { createRng, Rng } from "../utils/random.js";
import { createConsoleLogger, Logger } from "../utils/logger.js";

export const SPAWN_CLEARANCE = 2;

export interface GameDirectorOptions {
  logger?: Logger;
  /** Source for initial agent placement; defaults to a fixed seed. */
  spawnRng?: Rng;
}

function isSeeker(agent: Agent): agent is SeekerAgent {
  return agent.role === AgentRole.Seeker;
}

function isHider(agent: Agent): agent is HiderAgent {
  return agent.role === AgentRole.Hider;
}

function sighting(agent: Agent): Sighting {
  return { id: agent.id, position: agent.position };
}

function frozenVec(v: Vec3): Readonly<Vec3> {
  return Object.freeze({ x: v.x, y: v.y, z: v.z });
}

/**
 * Session state machine: Waiting → Active → Ended.
 *
 * All mutation happens inside `start`, `stop` and `tick`, on the caller's
 * thread. Readers consume the frozen snapshot published at the end of each
 * call. Within a tick agents are processed in ascending id order, seekers
 * before hiders for detection.
 */
export class GameDirector {
  readonly environment: Environment;
  readonly rules: GameRules;
  private readonly agents: Agent[];
  private readonly waypoints: Vec3[];
  private readonly logger: Logger;

  private phase = SessionPhase.Waiting;
  private tickCount = 0;
  private elapsedTime = 0;
  private caughtCount = 0;
  private winner: Winner | null = null;
  private log: GameEvent[] = [];
  private latest: GameSnapshot;

  constructor(environment: Environment, rules: GameRules, roster: readonly AgentSpec[], options: GameDirectorOptions = {}) {
    this.environment = environment;
    this.rules = parseGameRules(rules);
    this.logger = options.logger ?? createConsoleLogger("game");
    this.waypoints = patrolWaypoints(environment.playAreaSize);

    const ids = new Set<number>();
    for (const spec of roster) {
      if (!Number.isInteger(spec.id) || spec.id < 0) {
        throw new ConfigurationError([`roster: agent id ${spec.id} must be a non-negative integer`]);
      }
      if (ids.has(spec.id)) {
        throw new ConfigurationError([`roster: duplicate agent id ${spec.id}`]);
      }
      ids.add(spec.id);
    }
    if (!roster.some((spec) => spec.role === AgentRole.Seeker)) {
      throw new ConfigurationError(["roster: at least one seeker is required"]);
    }

    const spawnRng = options.spawnRng ?? createRng("spawn");
    let seekerOrdinal = 0;
    this.agents = [...roster]
      .sort((a, b) => a.id - b.id)
      .map((spec): Agent => {
        const position = environment.sampleSafePosition(spawnRng, SPAWN_CLEARANCE);
        if (spec.role === AgentRole.Seeker) {
          const waypointIndex = seekerOrdinal++ % this.waypoints.length;
          return {
            id: spec.id,
            role: AgentRole.Seeker,
            position,
            behavior: initialSeekerBehavior(),
            detected: false,
            caught: false,
            memory: initialMemory(waypointIndex),
          };
        }
        return {
          id: spec.id,
          role: AgentRole.Hider,
          position,
          behavior: initialHiderBehavior(),
          detected: false,
          caught: false,
          memory: initialMemory(),
        };
      });

    this.latest = this.publish([]);
  }

  /**
   * Validates `input` (merged over the defaults), generates the arena from the
   * obstacle seed and numbers seekers first, then hiders.
   */
  static fromConfig(input: unknown = {}, logger?: Logger): GameDirector {
    const config = parseGameConfig(input);
    const environment = Environment.fromSeed(
      config.obstacleSeed,
      {
        playAreaSize: config.playAreaSize,
        obstacleCount: config.numObstacles,
        hidingSpotCount: config.hidingSpotCount,
      },
      logger,
    );
    const roster: AgentSpec[] = [];
    for (let i = 0; i < config.seekerCount; i++) roster.push({ id: i, role: AgentRole.Seeker });
    for (let i = 0; i < config.hiderCount; i++) roster.push({ id: config.seekerCount + i, role: AgentRole.Hider });
    return new GameDirector(environment, rulesOf(config), roster, {
      logger,
      spawnRng: createRng(`${config.obstacleSeed}:spawn`),
    });
  }

  get totalHiders(): number {
    return this.agents.filter(isHider).length;
  }

  snapshot(): GameSnapshot {
    return this.latest;
  }

  /** Every event raised since the last `start()`. */
  events(): readonly GameEvent[] {
    return this.log;
  }

  /**
   * Begins a session from Waiting or Ended. Returns false (and changes
   * nothing) while a session is already active.
   */
  start(): boolean {
    if (this.phase === SessionPhase.Active) {
      this.logger.warn("start ignored: session already active");
      return false;
    }
    const totalHiders = this.totalHiders;
    if (totalHiders === 0) {
      throw new ConfigurationError(["roster: at least one hider is required to start a session"]);
    }

    this.tickCount = 0;
    this.elapsedTime = 0;
    this.caughtCount = 0;
    this.winner = null;
    this.log = [];
    let seekerOrdinal = 0;
    for (const agent of this.agents) {
      agent.detected = false;
      agent.caught = false;
      if (isSeeker(agent)) {
        agent.behavior = initialSeekerBehavior();
        agent.memory = initialMemory(seekerOrdinal++ % this.waypoints.length);
      } else {
        agent.behavior = initialHiderBehavior();
        agent.memory = initialMemory();
      }
    }
    this.phase = SessionPhase.Active;
    this.logger.info(
      `session started: ${this.agents.length - totalHiders} seekers, ${totalHiders} hiders, ${this.rules.gameDuration}s`,
    );
    this.latest = this.publish([]);
    return true;
  }

  /** Ends the session early. No-op once Ended. */
  stop(winner: Winner | null = null): GameSnapshot {
    if (this.phase === SessionPhase.Ended) return this.latest;
    const events: GameEvent[] = [];
    this.end(winner, events);
    this.latest = this.publish(events);
    return this.latest;
  }

  tick(dt: number, positions: ReadonlyMap<number, Vec3>): GameSnapshot {
    if (this.phase !== SessionPhase.Active) return this.latest;

    const step = Number.isFinite(dt) && dt > 0 ? dt : 0;
    this.tickCount += 1;
    this.elapsedTime += step;
    const remainingTime = this.rules.gameDuration - this.elapsedTime;

    // Agents without a reported position sit this tick out entirely.
    const present: Agent[] = [];
    for (const agent of this.agents) {
      const position = positions.get(agent.id);
      if (!position) continue;
      agent.position = { x: position.x, y: position.y, z: position.z };
      present.push(agent);
    }
    const seekers = present.filter(isSeeker);
    const hiders = present.filter(isHider);
    const events: GameEvent[] = [];

    for (const seeker of seekers) {
      for (const hider of hiders) {
        if (hider.caught) continue;
        const d = distance(seeker.position, hider.position);
        if (d <= this.rules.catchRadius) {
          this.catchHider(seeker, hider, events);
        } else if (
          d <= this.rules.detectionRadius &&
          !hider.detected &&
          this.environment.isLineOfSightClear(seeker.position, hider.position)
        ) {
          this.detectHider(seeker, hider, events);
        }
      }
    }

    const context: BehaviorContext = { environment: this.environment, rules: this.rules, waypoints: this.waypoints };
    const seekerSightings = seekers.map(sighting);
    for (const agent of present) {
      if (isSeeker(agent)) {
        const decision = CONTROLLERS[AgentRole.Seeker](agent, context, this.visibleHiders(agent, hiders), step);
        agent.behavior = decision.state;
        agent.memory = decision.memory;
      } else {
        const decision = CONTROLLERS[AgentRole.Hider](agent, context, seekerSightings, step);
        agent.behavior = nextHiderBehavior(agent.behavior, decision.state);
        agent.memory = decision.memory;
      }
    }

    if (this.caughtCount === this.totalHiders) {
      this.end(Winner.Seekers, events);
    } else if (remainingTime <= 0) {
      this.end(Winner.Hiders, events);
    }

    this.latest = this.publish(events);
    return this.latest;
  }

  private visibleHiders(seeker: SeekerAgent, hiders: readonly HiderAgent[]): Sighting[] {
    return hiders
      .filter(
        (h) =>
          !h.caught &&
          distance(seeker.position, h.position) <= this.rules.seekerVisionRange &&
          this.environment.isLineOfSightClear(seeker.position, h.position),
      )
      .map(sighting);
  }

  private catchHider(seeker: SeekerAgent, hider: HiderAgent, events: GameEvent[]) {
    hider.caught = true;
    hider.detected = true;
    hider.behavior = HiderBehavior.Caught;
    this.caughtCount += 1;
    this.record(events, { type: "caught", time: this.elapsedTime, seekerId: seeker.id, hiderId: hider.id });
    this.logger.info(`seeker #${seeker.id} caught hider #${hider.id} (${this.caughtCount}/${this.totalHiders})`);
  }

  private detectHider(seeker: SeekerAgent, hider: HiderAgent, events: GameEvent[]) {
    hider.detected = true;
    this.record(events, { type: "detected", time: this.elapsedTime, seekerId: seeker.id, hiderId: hider.id });
    this.logger.info(`seeker #${seeker.id} detected hider #${hider.id}`);
  }

  private end(winner: Winner | null, events: GameEvent[]) {
    this.phase = SessionPhase.Ended;
    this.winner = winner;
    this.record(events, { type: "ended", time: this.elapsedTime, winner });
    this.logger.info(`session ended: winner ${winner ?? "none"} after ${this.elapsedTime.toFixed(1)}s`);
  }

  private record(events: GameEvent[], event: GameEvent) {
    events.push(event);
    this.log.push(event);
  }

  private publish(events: readonly GameEvent[]): GameSnapshot {
    const hiders = this.agents.filter(isHider);
    const agents = this.agents.map(
      (agent): AgentSnapshot =>
        Object.freeze({
          id: agent.id,
          role: agent.role,
          position: frozenVec(agent.position),
          target: agent.memory.target ? frozenVec(agent.memory.target) : null,
          behaviorState: agent.behavior,
          detected: agent.detected,
          caught: agent.caught,
        }),
    );
    return Object.freeze({
      tick: this.tickCount,
      phase: this.phase,
      elapsedTime: this.elapsedTime,
      remainingTime: Math.max(0, this.rules.gameDuration - this.elapsedTime),
      caughtCount: this.caughtCount,
      detectedCount: hiders.filter((h) => h.detected && !h.caught).length,
      uncaughtCount: hiders.filter((h) => !h.caught).length,
      totalHiders: hiders.length,
      winner: this.winner,
      agents: Object.freeze(agents),
      obstacles: Object.freeze(this.environment.obstacles.map((o) => Object.freeze(toObstacleSnapshot(o)))),
      events: Object.freeze(events.map((e) => Object.freeze({ ...e }))),
    });
  }
}
