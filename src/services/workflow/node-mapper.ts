/**
 * Node Mapper
 *
 * Resolves logical role names to node ids and discovers which input of a
 * node takes free text. Field discovery is a prioritized lookup against
 * the node's inputs rather than a hardcoded path, which is what lets the
 * same HTTP contract drive differently shaped graphs.
 */

import {
  DEFAULT_SAVE_IMAGE_NODE_ID,
  SAVE_IMAGE_ROLE,
  TEXT_FIELD_CANDIDATES,
} from '../../constants.ts';
import { WorkflowError } from './errors.ts';
import type { WorkflowStore } from './store.ts';
import type { NodeMapping, RoleMap } from './types.ts';

export class NodeMapper {
  private readonly roles: Readonly<RoleMap>;
  private readonly variants: Readonly<Record<string, Readonly<RoleMap>>>;

  constructor(
    private readonly store: WorkflowStore,
    mapping: NodeMapping = { roles: {}, variants: {} },
    private readonly candidates: readonly string[] = TEXT_FIELD_CANDIDATES
  ) {
    this.roles = Object.freeze({ ...mapping.roles });
    this.variants = Object.freeze(
      Object.fromEntries(
        Object.entries(mapping.variants).map(([name, roles]) => [name, Object.freeze({ ...roles })])
      )
    );
  }

  /**
   * Resolve a role name to its node id. Anything that is not a configured
   * role is taken as a literal node id.
   *
   * @param variant - Workflow variant whose sub-mapping is consulted first
   */
  resolve(roleOrId: string | number, variant?: string): string {
    const key = String(roleOrId);

    if (variant) {
      const variantRoles = this.variants[variant];
      if (variantRoles && Object.hasOwn(variantRoles, key)) {
        return variantRoles[key] ?? key;
      }
    }

    if (Object.hasOwn(this.roles, key)) {
      return this.roles[key] ?? key;
    }

    return key;
  }

  /**
   * Whether `role` is mapped, either by the variant or at the top level.
   */
  hasRole(role: string, variant?: string): boolean {
    if (variant) {
      const variantRoles = this.variants[variant];
      if (variantRoles && Object.hasOwn(variantRoles, role)) return true;
    }
    return Object.hasOwn(this.roles, role);
  }

  /**
   * Pick the input field that should receive text on `nodeId`.
   *
   * `preferredField` wins when the node has it; otherwise the first
   * candidate present on the node is used.
   *
   * @throws WorkflowError NODE_NOT_FOUND or NO_TEXT_FIELD_FOUND
   */
  findTextField(nodeId: string, preferredField?: string): string {
    if (!this.store.hasNode(nodeId)) {
      throw WorkflowError.nodeNotFound(nodeId);
    }

    if (preferredField && this.store.hasField(nodeId, preferredField)) {
      return preferredField;
    }

    const field = this.candidates.find((candidate) => this.store.hasField(nodeId, candidate));
    if (!field) {
      throw WorkflowError.noTextFieldFound(nodeId);
    }
    return field;
  }

  /**
   * Node whose `executed` event carries the output image.
   */
  saveImageNodeId(): string {
    return this.roles[SAVE_IMAGE_ROLE] ?? DEFAULT_SAVE_IMAGE_NODE_ID;
  }
}
