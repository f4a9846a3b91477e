// ============================================
// Ant Decision Cycle Unit Tests
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import { Activity, Components, Scent, type World } from '#shared';
import { Ant, type ColonyParams } from '../Ant';
import { TileEffects, TileIndex } from '../../ecs/neighborhood';
import { requireAnt, requireLifespan, requirePosition } from '../../ecs/factories';
import { InvariantViolation } from '../../errors';
import {
  NEST,
  TEST_PARAMS,
  createTestAnt,
  createTestMorsel,
  createTestNest,
  createTestTrail,
  createTestWorld,
  sequenceRng,
} from '../../ecs/systems/__tests__/testUtils';

// ============================================
// Test Utilities
// ============================================

/**
 * Run one decision cycle for a single ant and commit its tile writes.
 */
function reactOnce(world: World, entity: number, rng: () => number = () => 0, params: ColonyParams = TEST_PARAMS): Ant {
  const index = TileIndex.capture(world, params.dimension, params.boundary);
  const effects = new TileEffects();
  const state = requireAnt(world, entity);
  const ant = new Ant(entity, state, requirePosition(world, entity), params, rng);

  ant.react(index.neighborhood(ant.location, state.scope, effects));
  effects.commit(world);
  return ant;
}

function catchError(fn: () => void): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

// ============================================
// Ant Tests
// ============================================

describe('Ant', () => {
  let world: World;

  beforeEach(() => {
    world = createTestWorld();
  });

  describe('preconditions', () => {
    it('rejects a missing neighborhood', () => {
      const entity = createTestAnt(world);
      const ant = new Ant(entity, requireAnt(world, entity), requirePosition(world, entity), TEST_PARAMS, () => 0);

      const error = catchError(() => ant.react(undefined));
      expect(error).toBeInstanceOf(InvariantViolation);
      expect(error).toMatchObject({ code: 'MISSING_NEIGHBORHOOD' });
    });

    it('rejects more than one emitted marker', () => {
      const entity = createTestAnt(world);
      const state = requireAnt(world, entity);
      const ant = new Ant(entity, state, requirePosition(world, entity), TEST_PARAMS, () => 0);
      state.offspring.push(
        { scent: Scent.COLONY, location: { x: 1, y: 1 }, strength: 5 },
        { scent: Scent.COLONY, location: { x: 1, y: 1 }, strength: 5 }
      );

      expect(catchError(() => ant.offspring())).toMatchObject({ code: 'EXCESS_OFFSPRING' });
    });
  });

  describe('target assessment', () => {
    it('picks up food and turns to carrying', () => {
      const morsel = createTestMorsel(world, { x: 2, y: 2 }, 5);
      const entity = createTestAnt(world, { x: 2, y: 2, concentration: 50 });
      const state = requireAnt(world, entity);
      state.memory.insert({ x: 9, y: 9 });

      const ant = reactOnce(world, entity);

      expect(ant.activity).toBe(Activity.CARRYING);
      expect(state.memory.size).toBe(0);
      // Reset to the maximum, then one tick of decay
      expect(ant.concentration).toBe(198);
      expect(requireLifespan(world, morsel).remaining).toBe(4);
    });

    it('heads home after the pickup', () => {
      createTestMorsel(world, { x: 2, y: 2 }, 5);
      const entity = createTestAnt(world, { x: 2, y: 2 });

      const ant = reactOnce(world, entity);

      // Zero inaccuracy aims straight at the nest at (5, 5)
      expect(ant.location).toEqual({ x: 3, y: 3 });
    });

    it('stores food at the nest and turns to foraging', () => {
      const nest = createTestNest(world);
      const entity = createTestAnt(world, { activity: Activity.CARRYING, concentration: 10 });

      const ant = reactOnce(world, entity);

      expect(world.getComponent(nest, Components.Nest)?.storage).toBe(1);
      expect(ant.activity).toBe(Activity.FORAGING);
      expect(ant.concentration).toBe(198);
    });

    it('does not store food while foraging', () => {
      const nest = createTestNest(world);
      const entity = createTestAnt(world, { concentration: 10 });

      const ant = reactOnce(world, entity);

      expect(world.getComponent(nest, Components.Nest)?.storage).toBe(0);
      expect(ant.activity).toBe(Activity.FORAGING);
      expect(ant.concentration).toBe(198);
    });

    it('carrying ants ignore morsels', () => {
      const morsel = createTestMorsel(world, { x: 2, y: 2 }, 5);
      const entity = createTestAnt(world, { x: 2, y: 2, activity: Activity.CARRYING, concentration: 10 });

      const ant = reactOnce(world, entity);

      expect(ant.activity).toBe(Activity.CARRYING);
      expect(ant.concentration).toBe(198);
      expect(requireLifespan(world, morsel).remaining).toBe(5);
    });
  });

  describe('trail reinforcement', () => {
    it('claims a new marker of its scent with the decayed budget', () => {
      const entity = createTestAnt(world, { x: 1, y: 1, concentration: 100 });

      const ant = reactOnce(world, entity);

      expect(ant.claim()).toEqual({
        entity,
        spawn: { scent: Scent.COLONY, location: { x: 1, y: 1 }, strength: 98 },
        communal: false,
      });
      expect(ant.role).toBe('follower');
      expect(ant.offspring()).toEqual({ scent: Scent.COLONY, location: { x: 1, y: 1 }, strength: 98 });
      expect(ant.offspring()).toBeUndefined();
    });

    it('strengthens an existing colony marker with a bonus', () => {
      const trail = createTestTrail(world, { x: 1, y: 1 }, Scent.COLONY, 50);
      const entity = createTestAnt(world, { x: 1, y: 1, concentration: 100 });

      const ant = reactOnce(world, entity);

      // 98 from the budget plus floor(50 * 0.1)
      expect(requireLifespan(world, trail).remaining).toBe(153);
      expect(ant.claim()).toBeUndefined();
    });

    it('strengthens an existing food marker without a bonus', () => {
      const trail = createTestTrail(world, { x: 1, y: 1 }, Scent.FOOD, 50);
      const entity = createTestAnt(world, { x: 1, y: 1, activity: Activity.CARRYING, concentration: 100 });

      reactOnce(world, entity);

      expect(requireLifespan(world, trail).remaining).toBe(148);
    });

    it('lays nothing once the budget is spent', () => {
      const entity = createTestAnt(world, { x: 1, y: 1, concentration: 1 });

      const ant = reactOnce(world, entity);

      expect(ant.concentration).toBe(0);
      expect(ant.claim()).toBeUndefined();
    });

    it('marks the claim communal when other ants share the tile', () => {
      const first = createTestAnt(world, { x: 1, y: 1 });
      createTestAnt(world, { x: 1, y: 1 });

      expect(reactOnce(world, first).claim()?.communal).toBe(true);
    });
  });

  describe('trail suppression', () => {
    it('clears a goal marker stronger than anything around it', () => {
      const center = createTestTrail(world, { x: 1, y: 1 }, Scent.FOOD, 30);
      createTestTrail(world, { x: 2, y: 1 }, Scent.FOOD, 10);
      const entity = createTestAnt(world, { x: 1, y: 1 });

      reactOnce(world, entity);

      expect(requireLifespan(world, center).remaining).toBe(0);
    });

    it('keeps a goal marker that is not a local maximum', () => {
      const center = createTestTrail(world, { x: 1, y: 1 }, Scent.FOOD, 10);
      createTestTrail(world, { x: 2, y: 1 }, Scent.FOOD, 30);
      const entity = createTestAnt(world, { x: 1, y: 1 });

      reactOnce(world, entity);

      expect(requireLifespan(world, center).remaining).toBe(10);
    });

    it('keeps the marker when the goal is in sight', () => {
      const center = createTestTrail(world, { x: 1, y: 1 }, Scent.FOOD, 30);
      createTestTrail(world, { x: 2, y: 1 }, Scent.FOOD, 10);
      createTestMorsel(world, { x: 0, y: 0 }, 3);
      const entity = createTestAnt(world, { x: 1, y: 1 });

      reactOnce(world, entity);

      expect(requireLifespan(world, center).remaining).toBe(30);
    });

    it('clears a lone goal marker with nothing nearby', () => {
      const center = createTestTrail(world, { x: 1, y: 1 }, Scent.COLONY, 5);
      const entity = createTestAnt(world, { x: 1, y: 1, activity: Activity.CARRYING });

      reactOnce(world, entity);

      expect(requireLifespan(world, center).remaining).toBe(0);
    });
  });

  describe('movement', () => {
    it('steps onto a visible goal', () => {
      createTestNest(world);
      const entity = createTestAnt(world, { x: 4, y: 4, activity: Activity.CARRYING });

      expect(reactOnce(world, entity).location).toEqual(NEST);
    });

    it('steps onto a visible morsel when foraging', () => {
      createTestMorsel(world, { x: 0, y: 0 }, 3);
      createTestTrail(world, { x: 2, y: 2 }, Scent.FOOD, 40);
      const entity = createTestAnt(world, { x: 1, y: 1 });

      expect(reactOnce(world, entity).location).toEqual({ x: 0, y: 0 });
    });

    it('follows the strongest goal marker', () => {
      createTestTrail(world, { x: 1, y: 1 }, Scent.FOOD, 30);
      createTestTrail(world, { x: 2, y: 1 }, Scent.FOOD, 10);
      const entity = createTestAnt(world, { x: 1, y: 1 });

      expect(reactOnce(world, entity).location).toEqual({ x: 2, y: 1 });
    });

    it('breaks ties in favour of the later ring tile', () => {
      createTestTrail(world, { x: 0, y: 0 }, Scent.FOOD, 7);
      createTestTrail(world, { x: 2, y: 2 }, Scent.FOOD, 7);
      const entity = createTestAnt(world, { x: 1, y: 1 });

      expect(reactOnce(world, entity).location).toEqual({ x: 2, y: 2 });
    });

    it('skips remembered tiles when following markers', () => {
      createTestTrail(world, { x: 0, y: 0 }, Scent.FOOD, 7);
      createTestTrail(world, { x: 2, y: 2 }, Scent.FOOD, 7);
      const entity = createTestAnt(world, { x: 1, y: 1 });
      requireAnt(world, entity).memory.insert({ x: 2, y: 2 });

      expect(reactOnce(world, entity).location).toEqual({ x: 0, y: 0 });
    });

    it('ignores markers of the wrong scent', () => {
      createTestTrail(world, { x: 2, y: 2 }, Scent.COLONY, 50);
      const entity = createTestAnt(world, { x: 1, y: 1 });

      // Wanders instead: with a zero draw the shuffle rotates the ring by one
      expect(reactOnce(world, entity).location).toEqual({ x: 1, y: 0 });
    });

    it('heads home when lost', () => {
      const entity = createTestAnt(world, { x: 1, y: 1, concentration: 2 });

      expect(reactOnce(world, entity).location).toEqual({ x: 2, y: 2 });
    });

    it('is not lost while standing on a marker', () => {
      createTestTrail(world, { x: 1, y: 1 }, Scent.COLONY, 10);
      const entity = createTestAnt(world, { x: 1, y: 1, concentration: 2 });

      expect(reactOnce(world, entity).location).toEqual({ x: 1, y: 0 });
    });

    it('aims at a point around the nest when the draw is not zero', () => {
      // Carrying from (1, 1): distance 8, radius floor(0.7 * 8) = 5,
      // ring offset 28 of 40 is (5, 4), so the aim wraps to (0, 9)
      const entity = createTestAnt(world, { x: 1, y: 1, activity: Activity.CARRYING });

      expect(reactOnce(world, entity, sequenceRng([0.7, 0.7])).location).toEqual({ x: 0, y: 2 });
    });

    it('takes any random step when every neighbour is remembered', () => {
      const entity = createTestAnt(world, { x: 1, y: 1 });
      const memory = requireAnt(world, entity).memory;
      for (let y = 0; y <= 2; y++) {
        for (let x = 0; x <= 2; x++) {
          memory.insert({ x, y });
        }
      }

      // Seven draws shuffle the ring, then x = -1 and y = +1
      const rng = sequenceRng([...Array<number>(7).fill(0.5), 0, 0.999]);
      expect(reactOnce(world, entity, rng).location).toEqual({ x: 0, y: 2 });
    });

    it('wraps around the grid edge', () => {
      const entity = createTestAnt(world, { x: 0, y: 0, concentration: 100 });

      // Zero draw wanders to the second ring offset (0, -1)
      expect(reactOnce(world, entity).location).toEqual({ x: 0, y: 9 });
    });

    it('stays on the grid under the clamp policy', () => {
      const entity = createTestAnt(world, { x: 0, y: 0, concentration: 100 });
      const params: ColonyParams = { ...TEST_PARAMS, boundary: 'clamp' };

      // Ring holds only (1, 0), (0, 1), (1, 1); the zero-draw shuffle puts (0, 1) first
      expect(reactOnce(world, entity, () => 0, params).location).toEqual({ x: 0, y: 1 });
    });
  });
});
