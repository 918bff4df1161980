/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Quadratic flow resistance: pdrop = a·F + b·F², mirrored for reverse flow
 */

import { oneWay } from '../types.js';
import type { FlowResult, QfrElement } from '../types.js';

/** Pressure drop of the secant used for the zero-flow slope when a = 0 (Pa) */
export const QFR_SECANT_PRESSURE = 1.0;

/** Flow magnitude for a non-negative pressure drop */
function flowMagnitude(element: QfrElement, pdrop: number): number {
  // Rationalized root, also valid for b = 0
  return 2.0 * pdrop / (element.a + Math.sqrt(element.a * element.a + 4.0 * element.b * pdrop));
}

export function quadraticZeroSlope(element: QfrElement): number {
  if (element.a > 0.0) {
    return 1.0 / element.a;
  }
  return flowMagnitude(element, QFR_SECANT_PRESSURE) / QFR_SECANT_PRESSURE;
}

export function quadratic(element: QfrElement, pdrop: number): FlowResult {
  if (pdrop === 0.0) {
    return oneWay(0.0, quadraticZeroSlope(element));
  }
  const magnitude = flowMagnitude(element, Math.abs(pdrop));
  const dflow = 1.0 / (element.a + 2.0 * element.b * magnitude);
  return oneWay(pdrop > 0.0 ? magnitude : -magnitude, dflow);
}
