/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Flow law dispatch over the closed set of element variants
 */

import { UnimplementedLawError } from '@airnet/data';
import type { FlowPath } from '@airnet/data';
import type { AirflowElement, FlowResult } from './types.js';
import { powerLaw, powerLawLinearization } from './laws/power-law.js';
import { doorway } from './laws/doorway.js';
import { duct } from './laws/duct.js';
import { quadratic, quadraticZeroSlope } from './laws/quadratic.js';
import { fan } from './laws/fan.js';
import { constantFlow, constantPowerFan, constantPowerFanLinearization } from './laws/sources.js';
import {
  checkValve,
  checkValveLinearization,
  reliefValve,
  reliefValveLinearization,
} from './laws/valves.js';

function unimplemented(element: never): never {
  const value: unknown = element;
  const type =
    typeof value === 'object' && value !== null && 'type' in value ? String(value.type) : String(value);
  throw new UnimplementedLawError(type);
}

/**
 * Evaluate an element's flow law at a trial pressure drop (Pa).
 * Positive pdrop drives flow from path.node0 toward path.node1.
 */
export function calculate(element: AirflowElement, path: FlowPath, pdrop: number): FlowResult {
  switch (element.type) {
    case 'plr':
      return powerLaw(element, path, pdrop);
    case 'dwc':
      return duct(element, path, pdrop);
    case 'qfr':
      return quadratic(element, pdrop);
    case 'dor':
      return doorway(element, path, pdrop);
    case 'cfr':
      return constantFlow(element);
    case 'fan':
      return fan(element, path, pdrop);
    case 'cpf':
      return constantPowerFan(element, path, pdrop);
    case 'ckv':
      return checkValve(element, path, pdrop);
    case 'prv':
      return reliefValve(element, pdrop);
    default:
      return unimplemented(element);
  }
}

/**
 * Slope dF/dpdrop used to initialize an unknown-pressure solve
 */
export function linearize(element: AirflowElement, path: FlowPath): number {
  switch (element.type) {
    case 'plr':
    case 'dor':
    case 'fan':
    case 'dwc':
      return powerLawLinearization(element, path);
    case 'qfr':
      return quadraticZeroSlope(element);
    case 'cfr':
      return 0.0;
    case 'cpf':
      return constantPowerFanLinearization(element);
    case 'ckv':
      return checkValveLinearization(element, path);
    case 'prv':
      return reliefValveLinearization(element);
    default:
      return unimplemented(element);
  }
}
