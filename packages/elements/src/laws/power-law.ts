/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Power-law resistance: laminar/turbulent blended orifice law
 *
 * Both candidates are computed with the upstream node's properties and the
 * smaller one wins, so the laminar law governs at low pressure drop and the
 * turbulent law above the crossover.
 */

import type { FlowPath } from '@airnet/data';
import { oneWay } from '../types.js';
import type { FlowResult, PowerLawCoefficients } from '../types.js';

export function powerLaw(coeffs: PowerLawCoefficients, path: FlowPath, pdrop: number): FlowResult {
  if (pdrop > 0.0) {
    const cdm = coeffs.lam * path.node0.dvisc;
    const fl = cdm * pdrop;
    const ft = coeffs.turb * path.node0.sqrtDensity * Math.pow(pdrop, coeffs.expt);
    if (fl <= ft) {
      return oneWay(fl, cdm);
    }
    return oneWay(ft, ft * coeffs.expt / pdrop);
  }

  if (pdrop < 0.0) {
    const cdm = coeffs.lam * path.node1.dvisc;
    const fl = cdm * pdrop;
    const ft = -coeffs.turb * path.node1.sqrtDensity * Math.pow(-pdrop, coeffs.expt);
    if (fl >= ft) {
      return oneWay(fl, cdm);
    }
    return oneWay(ft, ft * coeffs.expt / pdrop);
  }

  // Zero flow: averages both endpoints, unlike the one-sided branches above.
  // TODO: decide whether the zero-drop slope should use the upstream node only
  return oneWay(0.0, 0.5 * coeffs.lam * (path.node0.dvisc + path.node1.dvisc));
}

/**
 * Initial slope for an unknown-pressure solve, before a pressure drop exists.
 * Also used by the duct, which carries its own initialization coefficient.
 */
export function powerLawLinearization(coeffs: Pick<PowerLawCoefficients, 'init'>, path: FlowPath): number {
  return 0.5 * coeffs.init * (path.node0.dvisc + path.node1.dvisc);
}
