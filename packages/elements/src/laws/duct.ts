/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Duct with friction and dynamic loss coefficients
 *
 * Laminar:   pdrop = (lflc·L/D + ldlc) · μ·F / (2ρ·A·D)
 * Turbulent: pdrop = (f·L/D + tdlc) · F² / (2ρ·A²), f from Colebrook-White
 *
 * As with the power law, the smaller of the two candidate flows is used.
 */

import type { FlowPath } from '@airnet/data';
import { oneWay } from '../types.js';
import type { DwcElement, FlowResult } from '../types.js';

const MAX_ITERATIONS = 100;
const TOLERANCE = 1e-10;

/** Colebrook-White is evaluated no lower than the laminar/turbulent transition */
export const MIN_TURBULENT_REYNOLDS = 2300;

/** Darcy friction factor of fully rough flow (von Kármán) */
export function roughFrictionFactor(ed: number): number {
  const x = -2.0 * Math.log10(ed / 3.7);
  return 1.0 / (x * x);
}

/**
 * Turbulent mass flow magnitude for a positive pressure drop.
 * Iterates flow and the Colebrook friction factor together.
 */
export function turbulentDuctFlow(
  element: DwcElement,
  pdrop: number,
  density: number,
  viscosity: number,
): number {
  let f = element.ed > 0.0 ? roughFrictionFactor(element.ed) : 0.02;
  let flow = 0.0;
  for (let i = 0; i < MAX_ITERATIONS; i++) {
    flow = element.area * Math.sqrt(2.0 * density * pdrop / (f * element.ld + element.tdlc));
    const reynolds = Math.max(flow * element.hdia / (viscosity * element.area), MIN_TURBULENT_REYNOLDS);
    const x = -2.0 * Math.log10(element.ed / 3.7 + 2.51 / (reynolds * Math.sqrt(f)));
    const next = 1.0 / (x * x);
    if (Math.abs(next - f) <= TOLERANCE * f) {
      f = next;
      break;
    }
    f = next;
  }
  return element.area * Math.sqrt(2.0 * density * pdrop / (f * element.ld + element.tdlc));
}

/** dF/dpdrop of the laminar law per unit density/viscosity ratio */
function laminarConductance(element: DwcElement): number {
  return 2.0 * element.area * element.hdia / (element.lflc * element.ld + element.ldlc);
}

export function duct(element: DwcElement, path: FlowPath, pdrop: number): FlowResult {
  if (pdrop > 0.0) {
    const { node0 } = path;
    const cdm = laminarConductance(element) * node0.dvisc;
    const fl = cdm * pdrop;
    const ft = turbulentDuctFlow(element, pdrop, node0.density, node0.viscosity);
    if (fl <= ft) {
      return oneWay(fl, cdm);
    }
    return oneWay(ft, 0.5 * ft / pdrop);
  }

  if (pdrop < 0.0) {
    const { node1 } = path;
    const cdm = laminarConductance(element) * node1.dvisc;
    const fl = cdm * pdrop;
    const ft = -turbulentDuctFlow(element, -pdrop, node1.density, node1.viscosity);
    if (fl >= ft) {
      return oneWay(fl, cdm);
    }
    return oneWay(ft, 0.5 * ft / pdrop);
  }

  return oneWay(0.0, 0.5 * laminarConductance(element) * (path.node0.dvisc + path.node1.dvisc));
}
