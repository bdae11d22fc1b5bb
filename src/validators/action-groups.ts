/*
Purpose: check that action-group membership, name patterns and exclusion lists agree with the inventory.
Assumptions: patterns match from the start of the item name; every error is collected, none is thrown.
Usage: validateActionGroups(configs.map(createActionGroup), [createInventoryItem("docker_image", ["actiongroup_docker"])]).
*/

import type { ActionGroupConfig } from "../core/config.js";

// =============================================================================
// TYPES
// =============================================================================

export type ActionGroup = {
  name: string;
  pattern: RegExp;
  requiredAttribute: string;
  exclusions: ReadonlySet<string>;
  /** Member list the collection declares for this group, when known. */
  members?: readonly string[];
};

export type InventoryItem = {
  name: string;
  attributes: ReadonlySet<string>;
};

export type ActionGroupErrorKind =
  | "MissingAttribute"
  | "StaleExclusion"
  | "UnexpectedGroupMembership"
  | "UndeclaredMember"
  | "StaleMember";

export type ActionGroupValidationError = {
  kind: ActionGroupErrorKind;
  item: string;
  group: string;
  message: string;
};

// =============================================================================
// CONSTRUCTION
// =============================================================================

export function createActionGroup(config: ActionGroupConfig): ActionGroup {
  return {
    name: config.name,
    pattern: anchorPattern(config.pattern),
    requiredAttribute: config.required_attribute,
    exclusions: new Set(config.exclusions),
    members: config.members,
  };
}

export function createInventoryItem(name: string, attributes: Iterable<string> = []): InventoryItem {
  return { name, attributes: new Set(attributes) };
}

// =============================================================================
// VALIDATION
// =============================================================================

export function validateActionGroups(
  groups: readonly ActionGroup[],
  inventory: readonly InventoryItem[],
): ActionGroupValidationError[] {
  const errors: ActionGroupValidationError[] = [];
  const inventoryNames = new Set(inventory.map((item) => item.name));

  for (const item of inventory) {
    for (const group of groups) {
      const matches = group.pattern.test(item.name);
      const excluded = group.exclusions.has(item.name);
      const hasAttribute = item.attributes.has(group.requiredAttribute);

      if (matches && !excluded && !hasAttribute) {
        errors.push(
          createError("MissingAttribute", item.name, group, `does not declare ${group.requiredAttribute}`),
        );
      }
      if (excluded && !matches) {
        errors.push(
          createError("StaleExclusion", item.name, group, `is excluded but does not match ${group.pattern.source}`),
        );
      }
      if (hasAttribute && !matches) {
        errors.push(
          createError(
            "UnexpectedGroupMembership",
            item.name,
            group,
            `declares ${group.requiredAttribute} but does not match ${group.pattern.source}`,
          ),
        );
      } else if (hasAttribute && excluded) {
        errors.push(
          createError(
            "UnexpectedGroupMembership",
            item.name,
            group,
            `declares ${group.requiredAttribute} but is excluded from the group`,
          ),
        );
      }
    }
  }

  for (const group of groups) {
    // Exclusions naming items outside the inventory are still checked against the pattern.
    for (const name of group.exclusions) {
      if (!inventoryNames.has(name) && !group.pattern.test(name)) {
        errors.push(
          createError("StaleExclusion", name, group, `is excluded but does not match ${group.pattern.source}`),
        );
      }
    }

    if (group.members) {
      errors.push(...validateDeclaredMembers(group, group.members, inventory));
    }
  }

  return errors;
}

export function formatActionGroupError(error: ActionGroupValidationError): string {
  return `${error.kind}: ${error.item} (action group ${error.group}) ${error.message}`;
}

// =============================================================================
// INTERNALS
// =============================================================================

function validateDeclaredMembers(
  group: ActionGroup,
  declared: readonly string[],
  inventory: readonly InventoryItem[],
): ActionGroupValidationError[] {
  const errors: ActionGroupValidationError[] = [];
  const computed = inventory
    .filter((item) => group.pattern.test(item.name) && !group.exclusions.has(item.name))
    .map((item) => item.name);
  const declaredSet = new Set(declared);
  const computedSet = new Set(computed);

  for (const name of computed) {
    if (!declaredSet.has(name)) {
      errors.push(createError("UndeclaredMember", name, group, "is missing from the declared members"));
    }
  }
  for (const name of declared) {
    if (!computedSet.has(name)) {
      errors.push(createError("StaleMember", name, group, "is declared as a member but is not one"));
    }
  }
  return errors;
}

function createError(
  kind: ActionGroupErrorKind,
  item: string,
  group: ActionGroup,
  message: string,
): ActionGroupValidationError {
  return { kind, item, group: group.name, message };
}

function anchorPattern(pattern: string): RegExp {
  return new RegExp(`^(?:${pattern})`);
}
