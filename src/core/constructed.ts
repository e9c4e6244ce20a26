/**
 * Constructed Rules
 *
 * Applies `compose`, `groups` and `keyed_groups` to a registered host.
 */

import { ConstructionError } from './errors.js';
import { compileExpression, ExpressionError, isTruthy, stringify } from './expression.js';
import type { ExpressionValue } from './expression.js';
import type { HostVars, Inventory } from './inventory.js';
import type { Diagnostics } from '../lib/logger.js';
import { silentDiagnostics } from '../lib/logger.js';

/**
 * One `keyed_groups` entry
 */
export interface KeyedGroupRule {
  /** Expression whose value names the group(s) */
  key: string;
  prefix?: string;
  /** Default: `_` */
  separator?: string;
  /** Used when the key evaluates to an empty value */
  default_value?: string;
  /** Keep the separator when the value is empty (default: true) */
  trailing_separator?: boolean;
  /** Keep the separator when the prefix is empty (default: true) */
  leading_separator?: boolean;
  /** Group the generated groups are nested under */
  parent_group?: string;
}

/**
 * Rules applied to every host of a run
 */
export interface ConstructedRules {
  compose: Record<string, string>;
  groups: Record<string, string>;
  keyed_groups: KeyedGroupRule[];
}

/**
 * Sets composed variables on a host
 */
export interface CompositeVariableEvaluator {
  setCompositeVars(hostname: string, variables: HostVars, strict: boolean): void;
}

/**
 * Adds a host to the groups its variables select
 */
export interface GroupMembershipEvaluator {
  addToComposedGroups(hostname: string, variables: HostVars, strict: boolean): void;
  addToKeyedGroups(hostname: string, variables: HostVars, strict: boolean): void;
}

/**
 * Evaluates constructed rules into an inventory.
 */
export class ConstructedEvaluator implements CompositeVariableEvaluator, GroupMembershipEvaluator {
  constructor(
    private readonly inventory: Inventory,
    private readonly rules: ConstructedRules,
    private readonly diagnostics: Diagnostics = silentDiagnostics
  ) {}

  setCompositeVars(hostname: string, variables: HostVars, strict: boolean): void {
    // Composed variables are visible to later compose entries and to the group rules
    const scope: HostVars = { ...variables };

    for (const [name, source] of Object.entries(this.rules.compose)) {
      const value = this.evaluate(hostname, `compose.${name}`, source, scope, strict);
      if (value === undefined) continue;
      scope[name] = value;
      this.inventory.setVariable(hostname, name, value);
    }
  }

  addToComposedGroups(hostname: string, variables: HostVars, strict: boolean): void {
    for (const [group, source] of Object.entries(this.rules.groups)) {
      const result = this.evaluate(hostname, `groups.${group}`, source, variables, strict);
      if (result !== undefined && isTruthy(result)) {
        this.inventory.addHostToGroup(hostname, group);
      }
    }
  }

  addToKeyedGroups(hostname: string, variables: HostVars, strict: boolean): void {
    this.rules.keyed_groups.forEach((rule, index) => {
      const value = this.evaluate(hostname, `keyed_groups[${index}]`, rule.key, variables, strict);
      if (value === undefined) return;

      for (const key of keyedGroupKeys(value, rule)) {
        const group = keyedGroupName(key, rule);
        if (group === '') continue;
        this.inventory.addHostToGroup(hostname, group);
        if (rule.parent_group) {
          this.inventory.addChildGroup(rule.parent_group, group);
        }
      }
    });
  }

  /**
   * Evaluate one rule. Returns undefined when the rule was skipped.
   *
   * @throws ConstructionError when strict and the expression fails
   */
  private evaluate(
    hostname: string,
    rule: string,
    source: string,
    variables: HostVars,
    strict: boolean
  ): ExpressionValue | undefined {
    try {
      return compileExpression(source).evaluate(variables);
    } catch (error) {
      if (!(error instanceof ExpressionError)) {
        throw error;
      }
      if (strict) {
        throw new ConstructionError(
          `Could not evaluate ${rule} for host ${hostname}: ${error.message}`,
          hostname,
          rule
        );
      }
      this.diagnostics.vvv(`Skipping ${rule} for host ${hostname}: ${error.message}`);
      return undefined;
    }
  }
}

/**
 * Turn a key value into group keys: one per list element, one `k<sep>v`
 * per mapping entry, otherwise the value itself.
 */
function keyedGroupKeys(value: ExpressionValue, rule: KeyedGroupRule): string[] {
  const separator = rule.separator ?? '_';

  if (Array.isArray(value)) {
    return value.map((item) => withDefault(stringify(item), rule));
  }
  if (value !== null && typeof value === 'object') {
    return Object.entries(value).map(
      ([key, item]) => `${key}${separator}${withDefault(stringify(item), rule)}`
    );
  }
  return [withDefault(stringify(value), rule)];
}

function withDefault(key: string, rule: KeyedGroupRule): string {
  return key === '' && rule.default_value !== undefined ? rule.default_value : key;
}

/**
 * Build a keyed group name from its key and the rule's prefix/separator.
 */
export function keyedGroupName(key: string, rule: KeyedGroupRule): string {
  const prefix = rule.prefix ?? '';
  const separator = rule.separator ?? '_';
  const leading = rule.leading_separator ?? true;
  const trailing = rule.trailing_separator ?? true;

  if (key === '' && !trailing) {
    return prefix;
  }
  if (prefix === '') {
    return leading ? `${separator}${key}` : key;
  }
  return `${prefix}${separator}${key}`;
}
