/**
 * Inventory Model
 *
 * Hosts, host variables and groups produced by a run, plus their export in
 * the JSON shape Ansible reads from dynamic inventory scripts.
 */

/**
 * Host variables keyed by variable name
 */
export type HostVars = Record<string, unknown>;

/**
 * Group contents
 */
export interface InventoryGroup {
  hosts: string[];
  children: string[];
}

/**
 * Ansible dynamic inventory document
 */
export interface InventoryExport {
  _meta: { hostvars: Record<string, HostVars> };
  [group: string]: { hosts?: string[]; children?: string[] } | { hostvars: Record<string, HostVars> };
}

const ALL_GROUP = 'all';
const UNGROUPED_GROUP = 'ungrouped';

/**
 * Characters allowed in group names; everything else becomes `_`
 */
const INVALID_GROUP_CHARS = /[^A-Za-z0-9_]/g;

/**
 * Make a string safe to use as a group name.
 */
export function sanitizeGroupName(name: string): string {
  return name.replace(INVALID_GROUP_CHARS, '_');
}

/**
 * In-memory inventory.
 *
 * Hosts are unique by name: adding an existing host keeps it, and setting
 * a variable twice keeps the last value.
 */
export class Inventory {
  private readonly hosts = new Map<string, HostVars>();
  private readonly groups = new Map<string, { hosts: Set<string>; children: Set<string> }>();

  /**
   * Register a host (no-op if it already exists).
   */
  addHost(hostname: string): void {
    if (!this.hosts.has(hostname)) {
      this.hosts.set(hostname, {});
    }
  }

  hasHost(hostname: string): boolean {
    return this.hosts.has(hostname);
  }

  /**
   * Set a host variable.
   *
   * @throws Error if the host has not been added
   */
  setVariable(hostname: string, name: string, value: unknown): void {
    const vars = this.hosts.get(hostname);
    if (!vars) {
      throw new Error(`Host '${hostname}' is not in the inventory`);
    }
    vars[name] = value;
  }

  /**
   * Get a copy of a host's variables, or undefined for unknown hosts.
   */
  getHostVars(hostname: string): HostVars | undefined {
    const vars = this.hosts.get(hostname);
    return vars ? { ...vars } : undefined;
  }

  getHostnames(): string[] {
    return [...this.hosts.keys()];
  }

  /**
   * Register a group and return its sanitized name.
   */
  addGroup(name: string): string {
    const groupName = sanitizeGroupName(name);
    if (!this.groups.has(groupName)) {
      this.groups.set(groupName, { hosts: new Set(), children: new Set() });
    }
    return groupName;
  }

  /**
   * Add a host to a group, creating the group if needed.
   */
  addHostToGroup(hostname: string, group: string): void {
    const groupName = this.addGroup(group);
    this.groups.get(groupName)?.hosts.add(hostname);
  }

  /**
   * Make `child` a child group of `parent`, creating both if needed.
   */
  addChildGroup(parent: string, child: string): void {
    const parentName = this.addGroup(parent);
    const childName = this.addGroup(child);
    if (parentName !== childName) {
      this.groups.get(parentName)?.children.add(childName);
    }
  }

  getGroupNames(): string[] {
    return [...this.groups.keys()];
  }

  getGroup(name: string): InventoryGroup | undefined {
    const group = this.groups.get(name);
    if (!group) return undefined;
    return { hosts: [...group.hosts], children: [...group.children] };
  }

  /**
   * Groups a host belongs to directly, in creation order.
   */
  getHostGroups(hostname: string): string[] {
    return [...this.groups.entries()]
      .filter(([, group]) => group.hosts.has(hostname))
      .map(([name]) => name);
  }

  /**
   * Export as an Ansible dynamic inventory document.
   *
   * Hosts that belong to no group are listed under `ungrouped`; groups that
   * are nobody's child are listed under `all.children`.
   */
  toAnsibleJson(): InventoryExport {
    const hostvars: Record<string, HostVars> = {};
    for (const [hostname, vars] of this.hosts) {
      hostvars[hostname] = { ...vars };
    }

    const result: InventoryExport = { _meta: { hostvars } };
    const nestedGroups = new Set<string>();
    const groupedHosts = new Set<string>();

    for (const [name, group] of this.groups) {
      group.children.forEach((child) => nestedGroups.add(child));
      group.hosts.forEach((host) => groupedHosts.add(host));
      const entry: { hosts?: string[]; children?: string[] } = {};
      if (group.hosts.size > 0) entry.hosts = [...group.hosts];
      if (group.children.size > 0) entry.children = [...group.children];
      result[name] = entry;
    }

    const ungrouped = this.getHostnames().filter((host) => !groupedHosts.has(host));
    const topLevel = this.getGroupNames().filter(
      (name) => !nestedGroups.has(name) && name !== ALL_GROUP && name !== UNGROUPED_GROUP
    );

    result[UNGROUPED_GROUP] = { hosts: ungrouped };
    result[ALL_GROUP] = { children: [UNGROUPED_GROUP, ...topLevel] };
    return result;
  }
}
