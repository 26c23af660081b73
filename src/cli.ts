#!/usr/bin/env node
/**
 * Extract matching shapefiles from a tree of map sheet archives and write a
 * PostGIS loading script.
 *
 * Usage:
 *   npm run extract -- FO_1030009 contours.sql data/canvec contours topo
 */
import { run } from './run.js';

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('Error:', err instanceof Error ? err.message : err);
    process.exit(1);
  });
