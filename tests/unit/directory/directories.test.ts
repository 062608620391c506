/**
 * Unit tests for the contact and employee directories.
 */

import * as path from "path";
import { ContactDirectory } from "../../../src/directory/contacts";
import { EmployeeDirectory } from "../../../src/directory/employees";
import { testContacts, testEmployees } from "../../helpers/fakes";

describe("ContactDirectory", () => {
  const contacts = testContacts();

  it("matches exactly, then case-insensitively", () => {
    expect(contacts.match("David Smith")).toBe("David Smith");
    expect(contacts.match("  david smith ")).toBe("David Smith");
    expect(contacts.match("Dave Smith")).toBeUndefined();
  });

  it("looks up emails by canonical name", () => {
    expect(contacts.emailFor("Michael Chen")).toBe("michael.chen@example.com");
    expect(contacts.has("michael chen")).toBe(false);
  });

  it("loads the bundled contacts file", () => {
    const loaded = ContactDirectory.fromFile(path.join(__dirname, "../../../data/contacts.json"));
    expect(loaded.names()).toContain("David Smith");
  });
});

describe("EmployeeDirectory", () => {
  const employees = testEmployees();

  it("finds employees by name ignoring case", () => {
    expect(employees.find("alice kimble")?.greeting).toBe("Good to see you, Alice.");
    expect(employees.find("Alice")).toBeUndefined();
  });

  it("authorizes only listed doors", () => {
    expect(employees.isAuthorized("Alice Kimble", "front-gate")).toBe(true);
    expect(employees.isAuthorized("Alice Kimble", "lab-east")).toBe(false);
    expect(employees.isAuthorized("Alice Kimble", undefined)).toBe(false);
    expect(employees.isAuthorized("Maria Garcia", "front-gate")).toBe(false);
  });

  it("loads the bundled employees file", () => {
    const loaded = EmployeeDirectory.fromFile(path.join(__dirname, "../../../data/employees.json"));
    expect(loaded.isAuthorized("Sarah Johnson", "server-room")).toBe(true);
  });
});
