// src/ports.ts
// Port specs and the live Port model shared by every node and the pipeline

import { ClassicPreset } from 'rete';

import { PortDirection } from './types.js';
import { canonicalType } from './type-registry.js';
import { getOrCreateSocket } from './sockets.js';
import { coercePortValue, isEmptyValue } from './utils/type-utils.js';

export interface PortSpec {
  name: string;
  type: string;
  optional?: boolean;
}

export type NodeInputs = PortSpec[];
export type NodeOutputs = PortSpec[];

/** What display layers see of a port; every node variant reports its ports this way. */
export interface PortDescriptor {
  name: string;
  type: string;
  direction: PortDirection;
  optional: boolean;
  linked: boolean;
}

/**
 * A named, directional value slot on a node.
 *
 * A port holds at most one link. Linking is symmetric, and connecting a port
 * that is already linked replaces the previous link on both of its sides.
 */
export class Port extends ClassicPreset.Port<ClassicPreset.Socket> {
  readonly name: string;
  readonly direction: PortDirection;
  readonly declaredType: string;
  readonly optional: boolean;
  value: unknown = null;

  private _link: Port | null = null;

  constructor(spec: PortSpec, direction: PortDirection) {
    super(getOrCreateSocket(spec.type), spec.name, false);
    this.name = spec.name;
    this.direction = direction;
    this.declaredType = canonicalType(spec.type);
    this.optional = spec.optional === true;
  }

  get link(): Port | null {
    return this._link;
  }

  get isLinked(): boolean {
    return this._link !== null;
  }

  /**
   * Link this port to one of the opposite direction. Returns false for a same-direction pair.
   */
  connect(other: Port): boolean {
    if (other.direction === this.direction) {
      return false;
    }

    if (this._link === other) {
      return true;
    }

    this.disconnect();
    other.disconnect();

    this._link = other;
    other._link = this;
    return true;
  }

  /** Clear the link on both sides. Idempotent. */
  disconnect(): void {
    const partner = this._link;
    if (!partner) return;

    this._link = null;
    if (partner._link === this) {
      partner._link = null;
    }
  }

  /**
   * Current value as seen by the owning node. A linked input reads its upstream
   * output; textual values on non-string inputs are coerced to numbers or lists.
   */
  read(): unknown {
    if (this.direction === PortDirection.OUTPUT) {
      return this.value;
    }

    const raw = this._link ? this._link.value : this.value;
    return this.declaredType === 'string' ? raw : coercePortValue(raw);
  }

  /** True when a read would produce something: linked, or holding a local value. */
  isSatisfied(): boolean {
    return this._link !== null || !isEmptyValue(this.value);
  }

  describe(): PortDescriptor {
    return {
      name: this.name,
      type: this.declaredType,
      direction: this.direction,
      optional: this.optional,
      linked: this.isLinked,
    };
  }
}
