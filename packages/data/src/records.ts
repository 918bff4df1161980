/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Parsed network records - the interface between a network-file reader and
 * model assembly. One record per title, node, element or link statement.
 */

// ============================================================================
// Element type tags
// ============================================================================

export const ELEMENT_TYPES = ['plr', 'dwc', 'qfr', 'dor', 'cfr', 'fan', 'cpf', 'ckv', 'prv'] as const;

/**
 * plr: power-law resistance, dwc: duct with loss coefficients,
 * qfr: quadratic flow resistance, dor: doorway, cfr: constant flow rate,
 * fan: fan curve, cpf: constant-power fan, ckv: check valve,
 * prv: pressure-relief valve
 */
export type ElementType = (typeof ELEMENT_TYPES)[number];

export function isElementType(value: string): value is ElementType {
  return ELEMENT_TYPES.some((type) => type === value);
}

// ============================================================================
// Fan performance data
// ============================================================================

/**
 * One range of a fan performance curve at the reference density and rated
 * speed: rise(F) = a1 + a2*F + a3*F^2 + a4*F^3, valid for F up to maxFlow (kg/s).
 */
export interface FanCurveSegment {
  maxFlow: number;
  coefficients: readonly [number, number, number, number];
}

export type ElementArgument = number | readonly FanCurveSegment[];

/** Element fields keyed by their short or long name */
export type ElementArguments = Readonly<Record<string, ElementArgument | undefined>>;

// ============================================================================
// Records
// ============================================================================

/** 'v' variable, 'c' controlled (fixed pressure), 'a' ambient */
export type NodeTypeCode = 'v' | 'c' | 'a';

export interface TitleRecord {
  kind: 'title';
  title: string;
}

export interface NodeRecord {
  kind: 'node';
  name: string;
  type: NodeTypeCode;
  /** Node height (m) */
  ht: number;
  /** Temperature (K) */
  temp: number;
  /** Gauge pressure (Pa); a reader requires it unless type is 'v' */
  pres?: number;
}

export interface ElementRecord {
  kind: 'element';
  type: string;
  name: string;
  args: ElementArguments;
}

export interface LinkRecord {
  kind: 'link';
  name: string;
  node1: string;
  /** Height of the path above node1 (m) */
  ht1: number;
  node2: string;
  /** Height of the path above node2 (m) */
  ht2: number;
  element: string;
  wind?: string;
  wpmod?: number;
}

export type NetworkRecord = TitleRecord | NodeRecord | ElementRecord | LinkRecord;
