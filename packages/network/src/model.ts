/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Network model - builds the node/element/link graph from parsed records
 *
 * Construction runs in two passes. The first materializes the title, nodes
 * and elements in record order; the second resolves every link against the
 * finished node and element maps, so links may precede the declarations
 * they reference.
 */

import {
  DuplicateTitleError,
  UnresolvedReferenceError,
  createLogger,
  createNode,
  updateNodeProperties,
} from '@airnet/data';
import type {
  AirflowLink,
  AirflowNode,
  ElementArguments,
  LinkRecord,
  NetworkRecord,
  NodeRecord,
} from '@airnet/data';
import { createElement } from '@airnet/elements';
import type { AirflowElement } from '@airnet/elements';

const log = createLogger('Model');

export type NetworkLink = AirflowLink<AirflowElement>;

export type ElementFactory = (type: string, args: ElementArguments) => AirflowElement;

export interface ModelOptions {
  /** Replaces the built-in element construction (default: createElement) */
  elementFactory?: ElementFactory;
}

export class Model {
  title = '';
  /** Nodes by name, in first-declaration order */
  readonly nodes = new Map<string, AirflowNode>();
  /** Elements by name; one element may be shared by several links */
  readonly elements = new Map<string, AirflowElement>();
  readonly links: NetworkLink[] = [];
  /** Variable nodes in index order: variableNodes[i].index === i */
  readonly variableNodes: AirflowNode[] = [];
  /** Number of unknown pressures */
  readonly size: number;

  private titleSeen = false;
  private readonly elementFactory: ElementFactory;

  constructor(records: Iterable<NetworkRecord>, options: ModelOptions = {}) {
    this.elementFactory = options.elementFactory ?? createElement;

    const pendingLinks: LinkRecord[] = [];
    for (const record of records) {
      switch (record.kind) {
        case 'title':
          this.setTitle(record.title);
          break;
        case 'node':
          this.addNode(record);
          break;
        case 'element':
          this.addElement(record.name, record.type, record.args);
          break;
        case 'link':
          pendingLinks.push(record);
          break;
      }
    }

    for (const record of pendingLinks) {
      this.links.push(this.resolveLink(record));
    }

    this.size = this.indexVariableNodes();

    log.info(
      `Built model with ${this.nodes.size} nodes, ${this.elements.size} elements, ${this.links.length} links`,
      { operation: 'build', data: { size: this.size } },
    );
  }

  private setTitle(title: string): void {
    if (this.titleSeen) {
      throw new DuplicateTitleError(this.title, title);
    }
    this.titleSeen = true;
    this.title = title;
  }

  private addNode(record: NodeRecord): void {
    if (this.nodes.has(record.name)) {
      log.warn('Duplicate node name, replacing the earlier declaration', {
        operation: 'addNode',
        name: record.name,
      });
    }
    const node = createNode({
      name: record.name,
      variable: record.type !== 'c',
      height: record.ht,
      temperature: record.temp,
      pressure: record.pres ?? 0.0,
    });
    this.nodes.set(record.name, node);
    log.debug('Added node', { variable: node.variable, pressure: node.pressure }, {
      operation: 'addNode',
      name: record.name,
    });
  }

  private addElement(name: string, type: string, args: ElementArguments): void {
    const element = this.elementFactory(type, args);
    if (this.elements.has(name)) {
      log.warn('Duplicate element name, replacing the earlier declaration', {
        operation: 'addElement',
        name,
        elementType: type,
      });
    }
    this.elements.set(name, element);
  }

  private lookupNode(link: LinkRecord, name: string): AirflowNode {
    const node = this.nodes.get(name);
    if (!node) {
      throw new UnresolvedReferenceError(link.name, 'node', name);
    }
    return node;
  }

  private resolveLink(record: LinkRecord): NetworkLink {
    const node0 = this.lookupNode(record, record.node1);
    const node1 = this.lookupNode(record, record.node2);
    const element = this.elements.get(record.element);
    if (!element) {
      throw new UnresolvedReferenceError(record.name, 'element', record.element);
    }
    if (node0 === node1) {
      log.warn(`Link connects node '${node0.name}' to itself`, { operation: 'resolveLinks', name: record.name });
    }
    return {
      name: record.name,
      node0,
      node1,
      ht0: record.ht1,
      ht1: record.ht2,
      element,
      wind: record.wind,
      wpmod: record.wpmod ?? 0.0,
      mult: 1.0,
    };
  }

  /**
   * Assign dense indices to variable nodes in map order
   * @returns the number of variable nodes
   */
  private indexVariableNodes(): number {
    for (const node of this.nodes.values()) {
      if (node.variable) {
        node.index = this.variableNodes.length;
        this.variableNodes.push(node);
      } else {
        node.index = undefined;
      }
    }
    return this.variableNodes.length;
  }

  /**
   * Recompute density, viscosity and their derived values for every node
   * from its current temperature and pressure
   */
  setProperties(): void {
    for (const node of this.nodes.values()) {
      updateNodeProperties(node);
    }
  }

  /**
   * Human-readable overview: title, element counts per type, node and
   * link counts, and the size of the pressure system
   */
  summary(): string {
    const counts = new Map<string, number>();
    for (const element of this.elements.values()) {
      counts.set(element.type, (counts.get(element.type) ?? 0) + 1);
    }

    let text = `Title: ${this.title}\n\nElements:\n=========\n`;
    for (const [type, count] of counts) {
      text += `${type}: ${count}\n`;
    }
    text += `\nNodes: ${this.nodes.size}\n\nLinks: ${this.links.length}\n`;
    text += `\nSystem size: ${this.size} x ${this.size}\n`;
    return text;
  }
}
