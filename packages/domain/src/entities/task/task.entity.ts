/**
 * Task Entity
 *
 * A discrete unit of work within a Project.
 */

import { defineEntity } from "@keepsync/contracts";

export const TaskEntity = defineEntity({
  name: "Task",
  pluralName: "Tasks",
  description: "A discrete unit of work within a project.",

  fields: [
    {
      name: "title",
      type: "text",
      required: true,
      description: "Short summary of what needs to be done",
      validations: [{ min: 3, message: "Title must be at least 3 characters" }],
    },
    {
      name: "status",
      type: "enum",
      required: true,
      options: ["todo", "in_progress", "review", "done"],
      defaultValue: "todo",
      description: "Current progress state of the task",
    },
    {
      name: "estimatedHours",
      type: "number",
      required: false,
      description: "Estimated effort in hours to complete this task",
      validations: [{ min: 0 }],
    },
  ],

  relationships: [
    {
      type: "belongsTo",
      entity: "Project",
      required: true,
    },
  ],
});
