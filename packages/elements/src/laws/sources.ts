/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Flow sources: constant mass flow and constant-power fan
 */

import type { FlowPath } from '@airnet/data';
import { oneWay } from '../types.js';
import type { CfrElement, CpfElement, FlowResult } from '../types.js';

/** Imposed flow, independent of pressure drop */
export function constantFlow(element: CfrElement): FlowResult {
  return oneWay(element.flow, 0.0);
}

/**
 * Constant useful power: volume flow × pressure rise = upo.
 * Below the minimum rise the flow is held at its value at prmin.
 */
export function constantPowerFan(element: CpfElement, path: FlowPath, pdrop: number): FlowResult {
  const power = element.upo * path.node0.density;
  const rise = -pdrop;
  if (rise <= element.prmin) {
    return oneWay(power / element.prmin, 0.0);
  }
  return oneWay(power / rise, power / (rise * rise));
}

export function constantPowerFanLinearization(element: CpfElement): number {
  return element.ftyp / element.prmin;
}
