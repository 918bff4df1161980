/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Doorway: large vertical opening with buoyancy-driven two-way flow
 *
 * pdrop is taken at the bottom of the opening. With Δρ = ρ0 - ρ1 the pressure
 * difference at height z is pdrop - g·Δρ·z, which vanishes at the neutral
 * plane y = pdrop / (g·Δρ). Integrating the orifice equation over the
 * opening gives, for each side of the neutral plane,
 *
 *   F = (2/3) · C · √(2·g·|Δρ|·d) · d · √ρ,   C = 1.414214 · width · Cd
 *
 * where d is the distance from the neutral plane to the bottom (f0) or top (fh)
 * of the doorway. Two-way flow weights each branch by the density of the
 * node it leaves; one-way flow is weighted by the denser node.
 */

import { GRAVITY, createLogger } from '@airnet/data';
import type { FlowPath } from '@airnet/data';
import { oneWay, twoWay } from '../types.js';
import type { DorElement, FlowResult } from '../types.js';
import { powerLaw } from './power-law.js';

const log = createLogger('Doorway');

/** Leading factor of the opening constant C = 1.414214 · width · Cd */
export const DOORWAY_FLOW_FACTOR = 1.414214;

export function doorway(element: DorElement, path: FlowPath, pdrop: number): FlowResult {
  const { node0, node1 } = path;
  const drho = node0.density - node1.density;
  const dtemp = node0.temperature - node1.temperature;

  if (Math.abs(dtemp) < element.dtmin || drho === 0.0) {
    // Stack effect folded into the pressure drop at mid-height
    return powerLaw(element, path, pdrop - 0.5 * element.ht * GRAVITY * drho);
  }

  const gdrho = GRAVITY * Math.abs(drho);
  const y = pdrop / (GRAVITY * drho);
  const k = DOORWAY_FLOW_FACTOR * element.wd * element.cd * Math.sqrt(2.0 * gdrho);

  const below = Math.abs(y);
  const above = Math.abs(element.ht - y);
  const f0 = (2.0 / 3.0) * k * below * Math.sqrt(below);
  const fh = (2.0 / 3.0) * k * above * Math.sqrt(above);
  const df0 = k * Math.sqrt(below) / gdrho;
  const dfh = k * Math.sqrt(above) / gdrho;

  const sqrt0 = node0.sqrtDensity;
  const sqrt1 = node1.sqrtDensity;

  if (y < 0.0) {
    // Neutral plane below the opening
    if (drho > 0.0) {
      return oneWay(-sqrt0 * (fh - f0), sqrt0 * (dfh - df0));
    }
    return oneWay(sqrt1 * (fh - f0), sqrt1 * (dfh - df0));
  }

  if (y > element.ht) {
    // Neutral plane above the opening
    if (drho > 0.0) {
      return oneWay(sqrt0 * (f0 - fh), sqrt0 * (df0 - dfh));
    }
    return oneWay(-sqrt1 * (f0 - fh), sqrt1 * (df0 - dfh));
  }

  log.debug('two-way flow', { y, drho }, { operation: 'calculate', elementType: 'dor' });

  // Lower branch first; the denser side pushes air out below the neutral plane
  if (drho > 0.0) {
    return twoWay(sqrt0 * f0, sqrt0 * df0, -sqrt1 * fh, sqrt1 * dfh);
  }
  return twoWay(-sqrt1 * f0, sqrt1 * df0, sqrt0 * fh, sqrt0 * dfh);
}
