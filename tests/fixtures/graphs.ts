/**
 * Graphs shared by the resolver and renderer tests.
 */

import { StaticGraphSource } from '../../src/graph/GraphSource.js';

export const SAMPLE = StaticGraphSource.fromRecord('sample', {
  A: ['B', 'C'],
  B: ['D', 'E'],
  C: ['F', 'G'],
  D: ['H'],
  E: ['H', 'I'],
  F: [],
  G: ['I'],
  H: [],
  I: []
});

export const CYCLIC = StaticGraphSource.fromRecord('cyclic', {
  X: ['Y'],
  Y: ['Z'],
  Z: ['X']
});

/** B and C both reach D, which has a dependency of its own */
export const DIAMOND = StaticGraphSource.fromRecord('diamond', {
  A: ['B', 'C'],
  B: ['D'],
  C: ['D'],
  D: ['E'],
  E: []
});
