import pino from 'pino';

// ============================================
// Logger Configuration
// ============================================

const LOG_DIR = process.env.LOG_DIR || 'logs';
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const IS_DEV = process.env.NODE_ENV !== 'production';

/**
 * Create a logger with console + rotating file output
 * pino-roll is used as a Pino transport for file rotation
 * @param filename - Log file name (e.g., 'colony.log')
 * @param component - Component name for filtering (e.g., 'colony', 'perf')
 */
function createLogger(filename: string, component: string) {
  const targets: pino.TransportTargetOptions[] = [];

  // Console stream with pretty printing (development only)
  if (IS_DEV) {
    targets.push({
      level: LOG_LEVEL,
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    });
  }

  // Rotating file stream with JSON (always enabled)
  targets.push({
    level: 'info',
    target: 'pino-roll',
    options: {
      file: `${LOG_DIR}/${filename}`,
      size: '10m',
      limit: { count: 5 },
      mkdir: true,
    },
  });

  return pino(
    {
      level: LOG_LEVEL,
      base: { component },
    },
    pino.transport({ targets })
  );
}

// ============================================
// Logger Instances
// ============================================

// Simulation events (spawns, deliveries, termination)
export const logger = createLogger('colony.log', 'colony');

// Tick timing
export const perfLogger = createLogger('performance.log', 'perf');

// ============================================
// Convenience Methods for Simulation Events
// ============================================

export function logServerStarted(port: number) {
  logger.info({ port, event: 'server_started' }, `Colony server running on port ${port}`);
}

export function logViewerConnected(socketId: string) {
  logger.info({ socketId, event: 'viewer_connected' }, 'Viewer connected');
}

export function logViewerDisconnected(socketId: string, reason: string) {
  logger.info({ socketId, reason, event: 'viewer_disconnected' }, 'Viewer disconnected');
}

export function logColonySpawned(counts: { ants: number; morsels: number; totalStorage: number }) {
  logger.info(
    { ...counts, event: 'colony_spawned' },
    `Spawned ${counts.ants} ants and ${counts.morsels} morsels (${counts.totalStorage} food)`
  );
}

export function logSimulationOver(generation: number, collected: number) {
  logger.info(
    { generation, collected, event: 'simulation_over' },
    `Simulation over after ${generation} generations`
  );
}

export function logGenerationCapReached(generation: number, collected: number, totalStorage: number) {
  logger.warn(
    { generation, collected, totalStorage, event: 'generation_cap_reached' },
    `Stopped at generation ${generation} with ${collected}/${totalStorage} collected`
  );
}

/**
 * Log aggregate colony statistics (lightweight, frequent)
 */
export function logAggregateStats(stats: {
  generation: number;
  foragingAnts: number;
  carryingAnts: number;
  colonyTrails: number;
  foodTrails: number;
  morselsLeft: number;
  supplyLeft: number;
  collected: number;
}) {
  logger.info(
    { ...stats, event: 'aggregate_stats' },
    `Gen ${stats.generation}: ${stats.carryingAnts} carrying, ${stats.foragingAnts} foraging, ${stats.colonyTrails + stats.foodTrails} trails, collected ${stats.collected}`
  );
}
