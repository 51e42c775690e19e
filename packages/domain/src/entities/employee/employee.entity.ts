/**
 * Employee Entity
 *
 * Self-referencing: an employee's manager is another Employee.
 */

import { defineEntity, t, belongsTo, hasMany } from "@dualmap/contracts";

export const EmployeeEntity = defineEntity({
  name: "Employee",
  description: "A member of staff, optionally reporting to a manager.",

  fields: [
    { name: "id", type: t.integer() },
    { name: "name", type: t.text() },
    { name: "email", type: t.email() },
    {
      name: "hiredAt",
      type: t.nullable(t.datetime()),
    },
    {
      name: "manager",
      type: belongsTo("Employee", { optional: true, reverse: "reports", onDelete: "set null" }),
    },
    {
      name: "reports",
      type: hasMany("Employee", { reverse: "manager" }),
    },
  ],
});
