// ============================================
// Colony Simulation
// Owns the world, the seeded random source and the system runner
// ============================================

import type { Server } from 'socket.io';
import { mulberry32, sameLocation, shuffled, type Location, type RNG } from '#shared';
import {
  createAnt,
  createMorsel,
  createNest,
  createWorld,
  getGeneration,
  getNestStorage,
  setGeneration,
  type World,
} from './ecs';
import {
  DecaySystem,
  ForagingSystem,
  NetworkBroadcastSystem,
  SystemPriority,
  SystemRunner,
} from './ecs/systems';
import type { ColonyParams } from './colony/Ant';
import { gridDimension, nestLocation, totalStorage, type SimConfig } from './config';
import { InvariantViolation } from './errors';
import { logColonySpawned } from './logger';

export function colonyParams(config: SimConfig): ColonyParams {
  return {
    dimension: gridDimension(config),
    boundary: config.env.boundary,
    maxConcentration: config.ants.maxPheroConcentration,
    concentrationDecay: config.ants.pheroDecrease,
    reinforcementRatio: config.ants.pheroIncreaseRatio,
  };
}

/**
 * How a bounded run ended
 */
export interface RunOutcome {
  completed: boolean; // Every unit of food reached the nest
  generation: number;
  collected: number;
}

export class ColonySimulation {
  readonly world: World;
  private readonly rng: RNG;
  private readonly runner = new SystemRunner();
  private populated = false;

  constructor(
    readonly config: SimConfig,
    private readonly io?: Server
  ) {
    this.world = createWorld();
    this.rng = mulberry32(config.seed);

    this.runner.register(new ForagingSystem(colonyParams(config), this.rng), SystemPriority.FORAGING);
    this.runner.register(new DecaySystem(), SystemPriority.DECAY);
    this.runner.register(new NetworkBroadcastSystem(config), SystemPriority.NETWORK);
  }

  /**
   * Place the nest, every ant on the nest, and the morsels on distinct random tiles
   * away from the nest (tiles repeat only when there are more morsels than tiles).
   */
  populate(): void {
    if (this.populated) return;
    this.populated = true;

    const { ants, morsels } = this.config;
    const nest = nestLocation(this.config);
    createNest(this.world, nest);

    for (let i = 0; i < ants.count; i++) {
      createAnt(this.world, nest, nest, {
        memorySpan: ants.memorySpan,
        concentration: ants.maxPheroConcentration,
      });
    }

    const tiles = shuffled(this.rng, this.freeTiles(nest));
    for (let i = 0; i < morsels.count; i++) {
      const tile = tiles.length > 0 ? tiles[i % tiles.length] : nest;
      createMorsel(this.world, tile, morsels.storage);
    }

    logColonySpawned({ ants: ants.count, morsels: morsels.count, totalStorage: this.totalStorage() });
  }

  /**
   * Advance one generation and return its number
   */
  step(): number {
    const generation = getGeneration(this.world) + 1;
    setGeneration(this.world, generation);
    this.runner.update(this.world, generation, this.io);
    return generation;
  }

  storage(): number {
    return getNestStorage(this.world);
  }

  totalStorage(): number {
    return totalStorage(this.config);
  }

  generation(): number {
    return getGeneration(this.world);
  }

  /**
   * True exactly when all food has reached the nest
   */
  isOver(): boolean {
    const storage = this.storage();
    const total = this.totalStorage();
    if (storage > total) {
      throw new InvariantViolation('STORAGE_OVERFLOW', `Nest holds ${storage} of ${total} food`, {
        storage,
        total,
      });
    }
    return storage === total;
  }

  /**
   * Step until the colony is done or `maxGenerations` is reached (null for no cap)
   */
  run(maxGenerations: number | null = this.config.maxGenerations): RunOutcome {
    this.populate();
    while (!this.isOver()) {
      if (maxGenerations !== null && this.generation() >= maxGenerations) {
        return { completed: false, generation: this.generation(), collected: this.storage() };
      }
      this.step();
    }
    return { completed: true, generation: this.generation(), collected: this.storage() };
  }

  private freeTiles(nest: Location): Location[] {
    const { x: width, y: height } = gridDimension(this.config);
    const tiles: Location[] = [];
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        if (!sameLocation({ x, y }, nest)) tiles.push({ x, y });
      }
    }
    return tiles;
  }
}
