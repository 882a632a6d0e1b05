import { EventEmitter } from "node:events";

import type { StructuredLogger } from "../logger.js";
import type { CapabilityKind } from "../host/types.js";
import type { CapabilityDescriptor, DescriptorOfKind, ResourceDescriptor } from "./capabilities.js";

/** Payload emitted on the `changed` event. */
export interface CapabilityRegistryChange {
  readonly kind: CapabilityKind;
  readonly name: string;
  readonly action: "registered" | "replaced" | "unregistered";
}

/** Error thrown when code tries to remove or replace a protected capability. */
export class ProtectedCapabilityError extends Error {
  public readonly code = "E_CAPABILITY_PROTECTED";

  constructor(kind: CapabilityKind, name: string) {
    super(`${kind} '${name}' is protected and cannot be unregistered or replaced`);
    this.name = "ProtectedCapabilityError";
  }
}

function keyOf(kind: CapabilityKind, name: string): string {
  return `${kind}:${name}`;
}

/**
 * Mapping from capability name to descriptor, one namespace per kind. Every
 * mutation is a single `Map` operation, so a lookup never observes a partially
 * replaced entry. External extension code receives a reference to the
 * registry and may register or unregister at any time.
 */
export class CapabilityRegistry {
  private readonly entries = new Map<string, CapabilityDescriptor>();
  private readonly protectedKeys = new Set<string>();
  private readonly emitter = new EventEmitter();
  private readonly logger?: Pick<StructuredLogger, "info">;

  constructor(options: { logger?: Pick<StructuredLogger, "info"> } = {}) {
    this.logger = options.logger;
  }

  /**
   * Registers the descriptor, replacing any entry sharing its kind and name.
   * A replaced entry keeps its position in listings.
   */
  register(descriptor: CapabilityDescriptor): void {
    const key = keyOf(descriptor.kind, descriptor.name);
    const replaced = this.entries.has(key);
    if (replaced && this.protectedKeys.has(key)) {
      throw new ProtectedCapabilityError(descriptor.kind, descriptor.name);
    }
    this.entries.set(key, descriptor);
    this.logger?.info("capability_registered", { kind: descriptor.kind, name: descriptor.name, replaced });
    this.notify({ kind: descriptor.kind, name: descriptor.name, action: replaced ? "replaced" : "registered" });
  }

  /** Removes a capability. Returns `false` when nothing was registered under that name. */
  unregister(name: string, kind: CapabilityKind = "tool"): boolean {
    const key = keyOf(kind, name);
    if (this.protectedKeys.has(key)) {
      throw new ProtectedCapabilityError(kind, name);
    }
    if (!this.entries.delete(key)) {
      return false;
    }
    this.logger?.info("capability_unregistered", { kind, name });
    this.notify({ kind, name, action: "unregistered" });
    return true;
  }

  /** Marks an already registered capability as protected. */
  protect(kind: CapabilityKind, name: string): void {
    const key = keyOf(kind, name);
    if (!this.entries.has(key)) {
      throw new Error(`cannot protect unregistered ${kind} '${name}'`);
    }
    this.protectedKeys.add(key);
  }

  isProtected(kind: CapabilityKind, name: string): boolean {
    return this.protectedKeys.has(keyOf(kind, name));
  }

  get<K extends CapabilityKind>(kind: K, name: string): DescriptorOfKind<K> | undefined {
    const descriptor = this.entries.get(keyOf(kind, name));
    return descriptor && isOfKind(descriptor, kind) ? descriptor : undefined;
  }

  /** Lists descriptors in registration order, optionally restricted to one kind. */
  list(): CapabilityDescriptor[];
  list<K extends CapabilityKind>(kind: K): DescriptorOfKind<K>[];
  list(kind?: CapabilityKind): CapabilityDescriptor[] {
    const all = [...this.entries.values()];
    return kind ? all.filter((descriptor) => descriptor.kind === kind) : all;
  }

  findResource(uri: string): ResourceDescriptor | undefined {
    return this.list("resource").find((descriptor) => descriptor.uri === uri);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Subscribes to registry changes. Returns the unsubscribe function. */
  onChange(listener: (change: CapabilityRegistryChange) => void): () => void {
    this.emitter.on("changed", listener);
    return () => {
      this.emitter.off("changed", listener);
    };
  }

  private notify(change: CapabilityRegistryChange): void {
    this.emitter.emit("changed", change);
  }
}

function isOfKind<K extends CapabilityKind>(
  descriptor: CapabilityDescriptor,
  kind: K,
): descriptor is DescriptorOfKind<K> {
  return descriptor.kind === kind;
}
