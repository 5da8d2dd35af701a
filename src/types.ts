// =============================================================================
// Core Types
// =============================================================================

export type LayoutMode = 'horizontal' | 'vertical' | 'auto';

export type Direction = 'horizontal' | 'vertical';

export type GlyphSetName = 'braille' | 'blocks';

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface CellStyle {
  color?: string;
  dim?: boolean;
  bold?: boolean;
}

// =============================================================================
// Dashboard Options
// =============================================================================

/**
 * Already-validated, immutable configuration consumed by the dashboard core
 */
export interface DashboardOptions {
  capacity: number;
  updateInterval: number;
  frameRate: number;
  tickRate: number;
  units: readonly string[];
  indices: readonly number[];
  patterns: readonly NamedPattern[];
  max?: number;
  layout: LayoutMode;
  barWidth: number;
  barGap: number;
  groupGap: number;
  titles: readonly string[];
  glyphs: GlyphSetName;
  markerInterval: number;
  /** All series in one grouped chart instead of one pane each */
  group: boolean;
}

export interface NamedPattern {
  name: string;
  regex: string;
}

// =============================================================================
// CLI
// =============================================================================

export interface Flags {
  help?: boolean;
  version?: boolean;
}

export type Subcommand =
  | { kind: 'add'; name: string; regex: string }
  | { kind: 'remove'; name: string }
  | { kind: 'list' };
