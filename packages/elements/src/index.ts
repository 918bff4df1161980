/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @airnet/elements - flow element variants and their constitutive laws
 */

// Types
export type {
  AirflowElement,
  ElementOf,
  FlowResult,
  PowerLawCoefficients,
  PlrElement,
  DwcElement,
  QfrElement,
  DorElement,
  CfrElement,
  FanElement,
  CpfElement,
  CkvElement,
  PrvElement,
} from './types.js';
export { oneWay, twoWay, netFlow } from './types.js';

// Construction
export { createElement, FIELD_ALIASES } from './factory.js';

// Evaluation
export { calculate, linearize } from './calculate.js';

// Individual laws
export { powerLaw, powerLawLinearization } from './laws/power-law.js';
export { doorway } from './laws/doorway.js';
export { duct, turbulentDuctFlow, roughFrictionFactor, MIN_TURBULENT_REYNOLDS } from './laws/duct.js';
export { quadratic, quadraticZeroSlope, QFR_SECANT_PRESSURE } from './laws/quadratic.js';
export { fan, invertFanCurve, isFanOff } from './laws/fan.js';
export { constantFlow, constantPowerFan } from './laws/sources.js';
export { checkValve, reliefValve } from './laws/valves.js';
