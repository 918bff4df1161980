/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Flow element variants and the result shape every flow law returns
 */

import type { ElementType, FanCurveSegment } from '@airnet/data';

// ============================================================================
// Element variants
// ============================================================================

/** Coefficients shared by the power law and the elements that fall back to it */
export interface PowerLawCoefficients {
  init: number;               // laminar initialization coefficient
  lam: number;                // laminar flow coefficient
  turb: number;               // turbulent flow coefficient
  expt: number;               // turbulent flow exponent
}

export interface PlrElement extends PowerLawCoefficients {
  type: 'plr';
}

export interface DwcElement {
  type: 'dwc';
  length: number;             // m
  hdia: number;               // hydraulic diameter (m)
  area: number;               // cross-sectional area (m²)
  rough: number;              // roughness dimension (m)
  tdlc: number;               // turbulent dynamic loss coefficient
  lflc: number;               // laminar friction loss coefficient
  ldlc: number;               // laminar dynamic loss coefficient
  init: number;               // laminar initialization coefficient
  ed: number;                 // relative roughness, rough / hdia
  ld: number;                 // relative length, length / hdia
}

/** pdrop = a*F + b*F² */
export interface QfrElement {
  type: 'qfr';
  a: number;
  b: number;
}

export interface DorElement extends PowerLawCoefficients {
  type: 'dor';
  dtmin: number;              // minimum temperature difference for two-way flow (K)
  ht: number;                 // doorway height (m)
  wd: number;                 // doorway width (m)
  cd: number;                 // discharge coefficient
}

export interface CfrElement {
  type: 'cfr';
  flow: number;               // kg/s
}

export interface FanElement extends PowerLawCoefficients {
  type: 'fan';
  rdens: number;              // reference density of the curve (kg/m³)
  fdf: number;                // free delivery flow, rise = 0 (kg/s)
  sop: number;                // shut-off pressure, flow = 0 (Pa)
  off: number;                // fan is off below this relative speed
  speed: number;              // relative speed (RPM / rated RPM)
  curve: readonly FanCurveSegment[];
}

export interface CpfElement {
  type: 'cpf';
  upo: number;                // useful power output (W)
  prmin: number;              // minimum pressure rise (Pa)
  ftyp: number;               // typical mass flow rate (kg/s)
}

export interface CkvElement {
  type: 'ckv';
  dp0: number;                // cut-off pressure (Pa)
  coef: number;               // flow coefficient
}

export interface PrvElement {
  type: 'prv';
  fpos: number;               // design flow rate, positive direction (kg/s)
  cpos: number;               // relief pressure, positive direction (Pa)
  fneg: number;               // design flow rate, negative direction (kg/s)
  cneg: number;               // relief pressure, negative direction (Pa)
}

export type AirflowElement =
  | PlrElement
  | DwcElement
  | QfrElement
  | DorElement
  | CfrElement
  | FanElement
  | CpfElement
  | CkvElement
  | PrvElement;

export type ElementOf<T extends ElementType> = Extract<AirflowElement, { type: T }>;

// ============================================================================
// Flow law results
// ============================================================================

/**
 * Mass flow (kg/s) and its derivative with respect to pressure drop for one
 * trial pressure drop. flow2/dflow2 are zero unless branches is 2.
 */
export interface FlowResult {
  branches: 1 | 2;
  flow1: number;
  flow2: number;
  dflow1: number;
  dflow2: number;
}

export function oneWay(flow: number, dflow: number): FlowResult {
  return { branches: 1, flow1: flow, flow2: 0.0, dflow1: dflow, dflow2: 0.0 };
}

export function twoWay(flow1: number, dflow1: number, flow2: number, dflow2: number): FlowResult {
  return { branches: 2, flow1, flow2, dflow1, dflow2 };
}

/** Net flow over all branches */
export function netFlow(result: FlowResult): number {
  return result.branches === 2 ? result.flow1 + result.flow2 : result.flow1;
}
