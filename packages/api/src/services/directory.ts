import type { ConstraintSet, DepartmentDimension, UserDimension } from "@caseflow/shared";

export interface DepartmentEntry {
  id: string;
  name: string;
  constraints: ConstraintSet<DepartmentDimension>;
}

export interface UserEntry {
  id: string;
  roleIds: string[];
  constraints: ConstraintSet<UserDimension>;
}

/** Read-only view of the organisation, used for automatic assignment. */
export interface Directory {
  listDepartments(): Promise<DepartmentEntry[]>;
  listUsersWithRole(roleId: string): Promise<UserEntry[]>;
}

export class StaticDirectory implements Directory {
  constructor(
    private readonly departments: readonly DepartmentEntry[] = [],
    private readonly users: readonly UserEntry[] = [],
  ) {}

  async listDepartments(): Promise<DepartmentEntry[]> {
    return [...this.departments];
  }

  async listUsersWithRole(roleId: string): Promise<UserEntry[]> {
    return this.users.filter((u) => u.roleIds.includes(roleId));
  }
}
