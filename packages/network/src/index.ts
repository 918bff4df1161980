/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @airnet/network - airflow network model assembly
 */

export { Model } from './model.js';
export type { ElementFactory, ModelOptions, NetworkLink } from './model.js';
