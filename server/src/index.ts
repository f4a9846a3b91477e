// ============================================
// Colony Server Entry
// Loads configuration, runs the simulation and streams it to viewers
// ============================================

import { Server } from 'socket.io';
import type { SimulationOverMessage } from '#shared';
import { loadConfig } from './config';
import { ColonySimulation } from './simulation';
import { calculateColonyStats } from './telemetry';
import { buildWorldConfigMessage, buildWorldSnapshot } from './ecs/serialization/colonySerializer';
import { describeError } from './errors';
import {
  logger,
  perfLogger,
  logAggregateStats,
  logGenerationCapReached,
  logServerStarted,
  logSimulationOver,
  logViewerConnected,
  logViewerDisconnected,
} from './logger';

const PORT = parseInt(process.env.PORT || '3000', 10);
const STATS_LOG_INTERVAL_MS = 15000;
const PERF_LOG_INTERVAL_MS = 10000;

async function main(): Promise<void> {
  const config = await loadConfig(process.argv[2]);

  // ============================================
  // Socket.io Server Setup
  // ============================================

  const io = new Server(PORT, {
    cors: {
      origin: '*', // Viewers are served from anywhere
    },
  });

  logServerStarted(PORT);

  const simulation = new ColonySimulation(config, io);
  simulation.populate();

  io.on('connection', (socket) => {
    logViewerConnected(socket.id);

    socket.emit('worldConfig', buildWorldConfigMessage(config));
    socket.emit('worldSnapshot', buildWorldSnapshot(simulation.world, config));

    socket.on('disconnect', (reason) => {
      logViewerDisconnected(socket.id, reason);
    });
  });

  // ============================================
  // Generation Loop
  // ============================================

  const timers: NodeJS.Timeout[] = [];
  let running = true;
  let tickTimesMs: number[] = [];

  // Helper to wrap interval callbacks in try-catch
  const safeInterval = (name: string, callback: () => void, interval: number) => {
    timers.push(
      setInterval(() => {
        try {
          callback();
        } catch (error) {
          logger.error(
            { event: 'interval_error', intervalName: name, ...describeError(error) },
            `Interval ${name} threw an error`
          );
        }
      }, interval)
    );
  };

  const finish = (completed: boolean) => {
    running = false;
    const generation = simulation.generation();
    const collected = simulation.storage();

    if (completed) {
      logSimulationOver(generation, collected);
    } else {
      logGenerationCapReached(generation, collected, simulation.totalStorage());
    }

    const overMessage: SimulationOverMessage = { type: 'simulationOver', generation, collected };
    io.emit('simulationOver', overMessage);
    shutdown('simulation_over');
  };

  const tick = () => {
    if (!running) return;

    try {
      if (simulation.isOver()) {
        finish(true);
        return;
      }
      if (config.maxGenerations !== null && simulation.generation() >= config.maxGenerations) {
        finish(false);
        return;
      }

      const tickStart = performance.now();
      simulation.step();
      tickTimesMs.push(performance.now() - tickStart);
    } catch (error) {
      logger.fatal({ event: 'tick_failed', generation: simulation.generation(), ...describeError(error) }, 'Generation aborted');
      running = false;
      shutdown('tick_failed', 1);
    }
  };

  if (config.fps === null) {
    // Unthrottled: yield to the event loop between generations so viewers stay served
    const loop = () => {
      tick();
      if (running) setImmediate(loop);
    };
    setImmediate(loop);
  } else {
    timers.push(setInterval(tick, 1000 / config.fps));
  }

  // ============================================
  // Periodic Logging
  // ============================================

  safeInterval(
    'aggregate_stats',
    () => {
      logAggregateStats(calculateColonyStats(simulation.world));
    },
    STATS_LOG_INTERVAL_MS
  );

  safeInterval(
    'tick_stats',
    () => {
      if (tickTimesMs.length === 0) return;
      const sorted = [...tickTimesMs].sort((a, b) => a - b);
      const avgMs = sorted.reduce((sum, ms) => sum + ms, 0) / sorted.length;
      const p95Ms = sorted[Math.floor(sorted.length * 0.95)] ?? avgMs;
      perfLogger.info(
        {
          event: 'tick_stats',
          generations: sorted.length,
          avgMs: avgMs.toFixed(2),
          p95Ms: p95Ms.toFixed(2),
        },
        `Tick stats: avg=${avgMs.toFixed(2)}ms p95=${p95Ms.toFixed(2)}ms over ${sorted.length} generations`
      );
      tickTimesMs = [];
    },
    PERF_LOG_INTERVAL_MS
  );

  // ============================================
  // Graceful Shutdown
  // ============================================

  /**
   * Close the Socket.io server and let the process exit.
   */
  function shutdown(reason: string, exitCode = 0) {
    logger.info({ event: 'shutdown_initiated', reason }, `Shutting down (${reason})...`);
    running = false;
    timers.forEach((timer) => clearInterval(timer));

    // Close Socket.io server (stops accepting new connections, closes existing ones)
    io.close((err) => {
      if (err) {
        logger.error({ event: 'shutdown_error', error: err.message }, 'Error closing Socket.io server');
      } else {
        logger.info({ event: 'shutdown_complete' }, 'Server shut down cleanly');
      }
      process.exit(exitCode);
    });

    // Force exit after 3 seconds if graceful shutdown hangs
    setTimeout(() => {
      logger.warn({ event: 'shutdown_forced' }, 'Forced shutdown after timeout');
      process.exit(1);
    }, 3000).unref();
  }

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.fatal({ event: 'startup_failed', ...describeError(error) }, 'Colony server failed to start');
  process.exit(1);
});
