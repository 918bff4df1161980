/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Thermophysical properties of air
 *
 * Density follows the ideal gas law at absolute pressure (gauge + 1 atm);
 * viscosity is a linear fit around 0 °C. Inputs are not validated: a
 * temperature of 0 K gives non-finite values rather than an exception.
 */

import {
  AIR_DENSITY_FACTOR,
  AIR_VISCOSITY_INTERCEPT,
  AIR_VISCOSITY_SLOPE,
  ATMOSPHERIC_PRESSURE,
  ZERO_CELSIUS,
} from './config.js';
import type { AirProperties } from './network-types.js';

/**
 * Compute air properties for a temperature (K) and gauge pressure (Pa)
 */
export function computeAirProperties(temperature: number, pressure: number): AirProperties {
  const density = AIR_DENSITY_FACTOR * (ATMOSPHERIC_PRESSURE + pressure) / temperature;
  const viscosity = AIR_VISCOSITY_INTERCEPT + AIR_VISCOSITY_SLOPE * (temperature - ZERO_CELSIUS);
  return {
    density,
    viscosity,
    sqrtDensity: Math.sqrt(density),
    dvisc: density / viscosity,
  };
}

/**
 * Recompute a node's derived properties from its current temperature and pressure
 */
export function updateNodeProperties(
  node: AirProperties & { temperature: number; pressure: number },
): void {
  const props = computeAirProperties(node.temperature, node.pressure);
  node.density = props.density;
  node.viscosity = props.viscosity;
  node.sqrtDensity = props.sqrtDensity;
  node.dvisc = props.dvisc;
}
