/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Check valve and pressure-relief valve
 */

import type { FlowPath } from '@airnet/data';
import { oneWay } from '../types.js';
import type { CkvElement, FlowResult, PrvElement } from '../types.js';

/**
 * Closed (no flow) until the forward pressure drop exceeds dp0, then an
 * orifice on the excess pressure. Reverse flow is always blocked.
 */
export function checkValve(element: CkvElement, path: FlowPath, pdrop: number): FlowResult {
  const excess = pdrop - element.dp0;
  if (pdrop <= 0.0 || excess <= 0.0) {
    return oneWay(0.0, 0.0);
  }
  const flow = element.coef * path.node0.sqrtDensity * Math.sqrt(excess);
  return oneWay(flow, 0.5 * flow / excess);
}

/** Secant slope of the open valve over the first pascal of excess pressure */
export function checkValveLinearization(element: CkvElement, path: FlowPath): number {
  return 0.5 * element.coef * (path.node0.sqrtDensity + path.node1.sqrtDensity);
}

/**
 * Closed between -cneg and cpos. Past a relief pressure the flow grows
 * linearly and reaches the design flow when the excess equals the relief
 * pressure.
 */
export function reliefValve(element: PrvElement, pdrop: number): FlowResult {
  if (pdrop > element.cpos) {
    const slope = element.fpos / element.cpos;
    return oneWay(slope * (pdrop - element.cpos), slope);
  }
  if (pdrop < -element.cneg) {
    const slope = element.fneg / element.cneg;
    return oneWay(slope * (pdrop + element.cneg), slope);
  }
  return oneWay(0.0, 0.0);
}

export function reliefValveLinearization(element: PrvElement): number {
  return 0.5 * (element.fpos / element.cpos + element.fneg / element.cneg);
}
