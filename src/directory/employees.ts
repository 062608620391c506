/**
 * Employee Directory: who may open which door, and how to greet them.
 */

import * as fs from "fs";
import { z } from "zod";

const employeeSchema = z.object({
  name: z.string().min(1),
  greeting: z.string().min(1),
  permissions: z.object({ doors: z.array(z.string()) }),
});

export type Employee = z.infer<typeof employeeSchema>;

export class EmployeeDirectory {
  private readonly byName: ReadonlyMap<string, Employee>;

  constructor(employees: Employee[]) {
    this.byName = new Map(employees.map((e) => [e.name.toLowerCase(), e]));
  }

  static fromFile(filePath: string): EmployeeDirectory {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
    return new EmployeeDirectory(z.array(employeeSchema).parse(raw));
  }

  /** Case-insensitive lookup by full name. */
  find(name: string): Employee | undefined {
    return this.byName.get(name.trim().toLowerCase());
  }

  /** False when the employee is unknown, the door is unknown, or the door is not in their permissions. */
  isAuthorized(name: string, doorId: string | undefined): boolean {
    if (!doorId) return false;
    const employee = this.find(name);
    return employee !== undefined && employee.permissions.doors.includes(doorId);
  }
}
