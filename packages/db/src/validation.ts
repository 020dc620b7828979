import { z } from "zod";
import { RecordValidationError } from "./errors";

const requiredName = (label: string) => z.string().trim().min(1, `${label} is required`);
const optionalText = z
  .string()
  .trim()
  .nullish()
  .transform((value) => (value ? value : null));

export const personInputSchema = z.object({
  firstName: requiredName("first name"),
  middleName: optionalText,
  lastName: requiredName("last name"),
  maidenName: optionalText,
  birthDate: optionalText,
  deathDate: optionalText,
  burialPlace: optionalText,
  links: optionalText,
  notes: optionalText,
});

export const personUpdateSchema = personInputSchema.partial();

export const recordIdSchema = z.coerce.number().int().positive();

export const relationshipTypeSchema = z.string().trim().min(1, "relationship type is required");

export const SELF_RELATIONSHIP_MESSAGE = "a member cannot be related to themselves";

export const relationshipInputSchema = z
  .object({
    memberId: recordIdSchema,
    relativeId: recordIdSchema,
    relationshipType: relationshipTypeSchema,
  })
  .refine((input) => input.memberId !== input.relativeId, {
    message: SELF_RELATIONSHIP_MESSAGE,
    path: ["relativeId"],
  });

export type PersonInput = z.input<typeof personInputSchema>;
export type PersonFields = z.output<typeof personInputSchema>;
export type PersonUpdate = z.input<typeof personUpdateSchema>;
export type RelationshipInput = z.input<typeof relationshipInputSchema>;

/** Parses `input` or throws a RecordValidationError listing every failed field */
export function validate<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    throw new RecordValidationError({ message: `Invalid ${what}: ${issues.join("; ")}`, issues });
  }
  return result.data;
}
