/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Shared configuration: physical constants and runtime flags
 */

/** Gravitational acceleration used by buoyancy terms (m/s²) */
export const GRAVITY = 9.8;

/** Standard atmospheric pressure; node pressures are gauge values relative to it (Pa) */
export const ATMOSPHERIC_PRESSURE = 101325.0;

/** Ideal-gas factor for dry air, 1/R_air (kg/(m³·Pa)·K) */
export const AIR_DENSITY_FACTOR = 0.0034838;

/** Linear fit for air viscosity: mu = a + b * (T - 273.15) */
export const AIR_VISCOSITY_INTERCEPT = 1.71432e-5;
export const AIR_VISCOSITY_SLOPE = 4.828e-8;

/** 0 °C in kelvin */
export const ZERO_CELSIUS = 273.15;

/** Default node temperature when a record leaves it out (K) */
export const DEFAULT_TEMPERATURE = 293.15;

/** Environment variable that turns on info/debug logging */
export const DEBUG_ENV_VAR = 'AIRNET_DEBUG';

export function isDebugEnabled(): boolean {
  if (typeof process !== 'undefined' && process.env) {
    return process.env[DEBUG_ENV_VAR] === 'true';
  }
  return false;
}
