import type {
  CapabilityCategory,
  CapabilityDescriptor,
  CapabilityHandle,
} from "../types/Capability.js";
import { DuplicateCapabilityError } from "../core/Errors.js";

/**
 * Filter for CapabilityCatalogue.list().
 */
export interface CapabilityListFilter {
  category?: CapabilityCategory;
  /** Default: true */
  activeOnly?: boolean;
  /** Text search in id/name/description */
  text?: string;
}

interface CatalogueEntry {
  descriptor: CapabilityDescriptor;
  handle: CapabilityHandle;
}

/**
 * Capability Catalogue: owns the mapping from capability id to descriptor and handle.
 * Listing order is registration order.
 */
export class CapabilityCatalogue {
  private readonly entries = new Map<string, CatalogueEntry>();
  private readonly categoryIndex = new Map<CapabilityCategory, Set<string>>(); // category → ids

  /**
   * Register a capability. Throws DuplicateCapabilityError if the id exists.
   */
  register(descriptor: CapabilityDescriptor, handle: CapabilityHandle): void {
    this.validateDescriptor(descriptor);
    if (this.entries.has(descriptor.id)) {
      throw new DuplicateCapabilityError(descriptor.id);
    }
    this.entries.set(descriptor.id, {
      descriptor: Object.freeze({ ...descriptor }),
      handle,
    });
    this.indexCapability(descriptor);
  }

  /**
   * Remove a capability. Returns whether an entry was removed.
   */
  deregister(id: string): boolean {
    const entry = this.entries.get(id);
    if (!entry) return false;
    this.entries.delete(id);
    this.categoryIndex.get(entry.descriptor.category)?.delete(id);
    return true;
  }

  lookup(id: string): CapabilityHandle | undefined {
    return this.entries.get(id)?.handle;
  }

  describe(id: string): CapabilityDescriptor | undefined {
    return this.entries.get(id)?.descriptor;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  /**
   * List descriptors, optionally filtered.
   */
  list(filter: CapabilityListFilter = {}): CapabilityDescriptor[] {
    const activeOnly = filter.activeOnly ?? true;
    let candidates: CapabilityDescriptor[];

    if (filter.category) {
      const ids = this.categoryIndex.get(filter.category);
      if (!ids || ids.size === 0) return [];
      // Keep registration order rather than index insertion order
      candidates = [...this.entries.values()]
        .filter((e) => ids.has(e.descriptor.id))
        .map((e) => e.descriptor);
    } else {
      candidates = [...this.entries.values()].map((e) => e.descriptor);
    }

    if (activeOnly) {
      candidates = candidates.filter((d) => d.isActive);
    }

    if (filter.text) {
      const lower = filter.text.toLowerCase();
      candidates = candidates.filter(
        (d) =>
          d.id.toLowerCase().includes(lower) ||
          d.name.toLowerCase().includes(lower) ||
          d.description.toLowerCase().includes(lower),
      );
    }

    return candidates;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
    this.categoryIndex.clear();
  }

  private validateDescriptor(descriptor: CapabilityDescriptor): void {
    if (!descriptor.id) throw new Error("CapabilityDescriptor.id is required");
    if (!descriptor.inputSchema) {
      throw new Error(`CapabilityDescriptor.inputSchema is required: ${descriptor.id}`);
    }
    if (!(descriptor.rateWindowSeconds > 0)) {
      throw new Error(`CapabilityDescriptor.rateWindowSeconds must be > 0: ${descriptor.id}`);
    }
    if (descriptor.rateLimit !== undefined && descriptor.rateLimit < 0) {
      throw new Error(`CapabilityDescriptor.rateLimit must be >= 0: ${descriptor.id}`);
    }
  }

  private indexCapability(descriptor: CapabilityDescriptor): void {
    let ids = this.categoryIndex.get(descriptor.category);
    if (!ids) {
      ids = new Set();
      this.categoryIndex.set(descriptor.category, ids);
    }
    ids.add(descriptor.id);
  }
}
