/**
 * Project Entity
 *
 * Represents a body of work with a defined scope, timeline, and goal.
 * A project owns its tasks: they arrive with the project's payload, are
 * reconciled when the project is saved, and are deleted with it.
 */

import { defineEntity } from "@keepsync/contracts";

export const ProjectEntity = defineEntity({
  name: "Project",
  pluralName: "Projects",
  description:
    "A body of work with a defined scope, timeline, and goal. Owns the tasks it is broken into.",

  fields: [
    {
      name: "name",
      type: "text",
      required: true,
      description: "Project name or title",
      validations: [{ min: 2, max: 120 }],
    },
    {
      name: "description",
      type: "rich_text",
      required: false,
      description: "Detailed description of the project scope and goals",
    },
    {
      name: "status",
      type: "enum",
      required: true,
      options: ["planning", "active", "on_hold", "completed"],
      defaultValue: "planning",
      description: "Current phase of the project lifecycle",
    },
    {
      name: "dueDate",
      type: "date",
      required: false,
      description: "Target completion date for the project",
    },
  ],

  relationships: [
    {
      type: "hasMany",
      entity: "Task",
      keepUpdated: true,
    },
  ],
});
