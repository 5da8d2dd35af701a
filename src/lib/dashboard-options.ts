/**
 * Turns parsed command-line options into the immutable pieces the
 * dashboard runs on: the router mode and the chart layout.
 */

import type { DashboardOptions, NamedPattern } from '../types.js';
import type { CliOptions } from '../utils/args.js';
import type { RouterMode } from '../ingest/router.js';
import type { DashboardLayout } from '../dashboard/dashboard.js';
import { GLYPH_SETS } from '../render/glyphs.js';

export function buildDashboardOptions(cli: CliOptions, patterns: readonly NamedPattern[]): DashboardOptions {
  return Object.freeze({
    capacity: cli.capacity,
    updateInterval: cli.updateInterval,
    frameRate: cli.frameRate,
    tickRate: cli.tickRate,
    units: Object.freeze([...cli.units]),
    indices: Object.freeze([...cli.indices]),
    patterns: Object.freeze([...patterns]),
    max: cli.max,
    layout: cli.layout,
    barWidth: cli.barWidth,
    barGap: cli.barGap,
    groupGap: cli.groupGap,
    titles: Object.freeze([...cli.titles]),
    glyphs: cli.glyphs,
    markerInterval: cli.markerInterval,
    group: cli.group,
  });
}

export function routerModeFor(options: DashboardOptions): RouterMode {
  if (options.units.length > 0) {
    return { kind: 'units', units: options.units };
  }
  if (options.patterns.length > 0) {
    return { kind: 'patterns', patterns: options.patterns };
  }
  return { kind: 'positional', indices: options.indices };
}

export function layoutFor(options: DashboardOptions): DashboardLayout {
  return {
    layout: options.layout,
    titles: options.titles,
    group: options.group,
    chart: {
      barWidth: options.barWidth,
      barGap: options.barGap,
      groupGap: options.groupGap,
      glyphs: GLYPH_SETS[options.glyphs],
      max: options.max,
      markerInterval: options.markerInterval,
      updateInterval: options.updateInterval,
    },
  };
}
