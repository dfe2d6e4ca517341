/**
 * Company Entity
 *
 * An organization the business has a relationship with. Its contacts are
 * edited together with the company in one form.
 */

import { defineEntity } from "@keepsync/contracts";

export const CompanyEntity = defineEntity({
  name: "Company",
  pluralName: "Companies",
  description:
    "An organization the business has a relationship with. Groups the people who work there.",

  fields: [
    {
      name: "name",
      type: "text",
      required: true,
      description: "Official company name",
    },
    {
      name: "website",
      type: "url",
      required: false,
      description: "Company website URL",
    },
    {
      name: "size",
      type: "enum",
      required: false,
      options: ["1-10", "11-50", "51-200", "201-1000", "1000+"],
      description: "Approximate number of employees",
    },
  ],

  relationships: [
    {
      type: "hasMany",
      entity: "Contact",
      as: "people",
      keepUpdated: true,
    },
  ],
});
