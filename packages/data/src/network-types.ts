/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Node and link types of the airflow network graph
 */

import { DEFAULT_TEMPERATURE } from './config.js';
import { updateNodeProperties } from './air-properties.js';

/** Air properties derived from a node's temperature and pressure */
export interface AirProperties {
  density: number;            // kg/m³
  viscosity: number;          // Pa·s
  sqrtDensity: number;        // √(kg/m³)
  dvisc: number;              // density / viscosity (s/m²)
}

export interface AirflowNode extends AirProperties {
  name: string;
  /** true: pressure is an unknown to be solved, false: fixed boundary value */
  variable: boolean;
  height: number;             // m
  temperature: number;        // K
  pressure: number;           // Pa, gauge
  /** Dense 0-based position among variable nodes; undefined for fixed nodes */
  index?: number;
}

export interface NodeInit {
  name: string;
  variable?: boolean;
  height?: number;
  temperature?: number;
  pressure?: number;
}

/**
 * Create a node with its air properties already computed
 */
export function createNode(init: NodeInit): AirflowNode {
  const node: AirflowNode = {
    name: init.name,
    variable: init.variable ?? true,
    height: init.height ?? 0.0,
    temperature: init.temperature ?? DEFAULT_TEMPERATURE,
    pressure: init.pressure ?? 0.0,
    index: undefined,
    density: 0.0,
    viscosity: 0.0,
    sqrtDensity: 0.0,
    dvisc: 0.0,
  };
  updateNodeProperties(node);
  return node;
}

/**
 * The part of a link a flow law reads: its two endpoint nodes.
 * Positive pressure drop drives flow from node0 toward node1.
 */
export interface FlowPath {
  readonly node0: Readonly<AirflowNode>;
  readonly node1: Readonly<AirflowNode>;
}

export interface AirflowLink<E> extends FlowPath {
  name: string;
  node0: AirflowNode;
  node1: AirflowNode;
  /** Height of the path relative to node0 (m) */
  ht0: number;
  /** Height of the path relative to node1 (m) */
  ht1: number;
  element: E;
  wind?: string;
  /** Wind pressure modifier */
  wpmod: number;
  /** Flow multiplier */
  mult: number;
}
