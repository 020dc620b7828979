import { z } from "zod";
import { SELF_RELATIONSHIP_MESSAGE, personInputSchema, relationshipTypeSchema } from "@kinmap/db";

const key = z.union([z.string().min(1), z.number().int()]).transform(String);

/** Person fields follow the store's own rules, so an import never fails halfway */
export const familyFilePersonSchema = personInputSchema.extend({ key });

export const familyFileRelationshipSchema = z
  .object({
    member: key,
    relative: key,
    type: relationshipTypeSchema,
  })
  .refine((relationship) => relationship.member !== relationship.relative, {
    message: SELF_RELATIONSHIP_MESSAGE,
    path: ["relative"],
  });

/**
 * A family exchanged as JSON. Relationships name persons by their `key`,
 * which is local to the file.
 */
export const familyFileSchema = z
  .object({
    persons: z.array(familyFilePersonSchema),
    relationships: z.array(familyFileRelationshipSchema).default([]),
  })
  .superRefine((file, ctx) => {
    const keys = new Set<string>();
    file.persons.forEach((person, index) => {
      if (keys.has(person.key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate person key '${person.key}'`,
          path: ["persons", index, "key"],
        });
      }
      keys.add(person.key);
    });

    file.relationships.forEach((relationship, index) => {
      for (const field of ["member", "relative"] as const) {
        if (!keys.has(relationship[field])) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `unknown person key '${relationship[field]}'`,
            path: ["relationships", index, field],
          });
        }
      }
    });
  });

export type FamilyFile = z.output<typeof familyFileSchema>;
export type FamilyFilePerson = z.output<typeof familyFilePersonSchema>;
