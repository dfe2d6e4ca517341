/**
 * Contact Entity
 *
 * A person at a company. Form input is normalized before assignment:
 * emails are lowercased and a single "fullName" is accepted in place of
 * "name".
 */

import { defineEntity, type AttributeMap } from "@keepsync/contracts";

function prepareContact(input: AttributeMap): AttributeMap {
  const { fullName, email, ...rest } = input;
  const prepared: AttributeMap = { ...rest };
  if (prepared.name === undefined && typeof fullName === "string") {
    prepared.name = fullName.trim();
  }
  if (typeof email === "string") prepared.email = email.trim().toLowerCase();
  return prepared;
}

export const ContactEntity = defineEntity({
  name: "Contact",
  pluralName: "Contacts",
  description: "A person at a company the business has a relationship with.",

  fields: [
    {
      name: "name",
      type: "text",
      required: true,
      description: "Full name of the contact",
    },
    {
      name: "email",
      type: "email",
      required: true,
      description: "Primary email address",
    },
    {
      name: "role",
      type: "text",
      required: false,
      description: "Job title or role at their company",
    },
    {
      name: "status",
      type: "enum",
      required: true,
      options: ["lead", "active", "inactive"],
      defaultValue: "lead",
      description: "Current relationship status with this contact",
    },
  ],

  relationships: [
    {
      type: "belongsTo",
      entity: "Company",
      required: true,
    },
  ],

  hooks: {
    prepare: prepareContact,
  },
});
