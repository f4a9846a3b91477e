// ============================================
// Network Messages
// Server -> viewer communication types
// ============================================

import type { Activity, Dimension, Location, Scent } from './types';

// Sent once per connection so a viewer can lay out the grid
export interface WorldConfigMessage {
  type: 'worldConfig';
  dimension: Dimension;
  tileSide: number;
  background: [number, number, number];
  showGrid: boolean;
  totalStorage: number;
}

export interface AntView {
  id: number;
  location: Location;
  activity: Activity;
}

export interface TrailView {
  id: number;
  location: Location;
  scent: Scent;
  strength: number;
}

export interface MorselView {
  id: number;
  location: Location;
  supply: number;
  initialSupply: number;
}

export interface NestView {
  id: number;
  location: Location;
  storage: number;
}

// Kinds hidden by the presentation flags are left out
export interface WorldSnapshotMessage {
  type: 'worldSnapshot';
  generation: number;
  ants: AntView[];
  trails: TrailView[];
  morsels: MorselView[];
  nest: NestView | null;
}

export interface ColonyStatsMessage {
  type: 'colonyStats';
  generation: number;
  collected: number;
  totalStorage: number;
}

export interface SimulationOverMessage {
  type: 'simulationOver';
  generation: number;
  collected: number;
}

export type ServerMessage =
  | WorldConfigMessage
  | WorldSnapshotMessage
  | ColonyStatsMessage
  | SimulationOverMessage;
