/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @airnet/data - network records, graph types, air properties, shared infrastructure
 */

export { computeAirProperties, updateNodeProperties } from './air-properties.js';
export { createNode } from './network-types.js';
export type { AirProperties, AirflowNode, AirflowLink, FlowPath, NodeInit } from './network-types.js';
export { ELEMENT_TYPES, isElementType } from './records.js';
export type {
  ElementType,
  ElementArgument,
  ElementArguments,
  FanCurveSegment,
  NodeTypeCode,
  TitleRecord,
  NodeRecord,
  ElementRecord,
  LinkRecord,
  NetworkRecord,
} from './records.js';
export {
  AirflowError,
  MissingArgumentError,
  InvalidElementError,
  UnknownElementTypeError,
  UnresolvedReferenceError,
  DuplicateTitleError,
  UnimplementedLawError,
} from './errors.js';
export { createLogger } from './logger.js';
export type { Logger, LogLevel, LogContext } from './logger.js';
export * from './config.js';
