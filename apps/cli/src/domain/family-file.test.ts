import { describe, it, expect } from "vitest";
import { familyFileSchema } from "./family-file";

describe("familyFileSchema", () => {
  it("accepts numeric keys and a missing relationship list", () => {
    const result = familyFileSchema.safeParse({
      persons: [{ key: 7, firstName: "Ada", lastName: "Lund", notes: null }],
    });

    expect(result.success).toBe(true);
    expect(result.data).toEqual({
      persons: [
        {
          key: "7",
          firstName: "Ada",
          middleName: null,
          lastName: "Lund",
          maidenName: null,
          birthDate: null,
          deathDate: null,
          burialPlace: null,
          links: null,
          notes: null,
        },
      ],
      relationships: [],
    });
  });

  it("reports duplicate keys", () => {
    const result = familyFileSchema.safeParse({
      persons: [
        { key: "a", firstName: "Ada", lastName: "Lund" },
        { key: "a", firstName: "Bo", lastName: "Lund" },
      ],
    });

    expect(result.success).toBe(false);
    expect(result.error?.issues.map((issue) => issue.message)).toEqual(["duplicate person key 'a'"]);
  });

  it("applies the store's name rules", () => {
    const result = familyFileSchema.safeParse({
      persons: [{ key: "a", firstName: "  ", lastName: "Lund" }],
    });

    expect(result.success).toBe(false);
    expect(result.error?.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)).toEqual([
      "persons.0.firstName: first name is required",
    ]);
  });

  it("rejects self relationships and blank types", () => {
    const result = familyFileSchema.safeParse({
      persons: [
        { key: "a", firstName: "Ada", lastName: "Lund" },
        { key: "b", firstName: "Bo", lastName: "Lund" },
      ],
      relationships: [
        { member: "a", relative: "a", type: "mother" },
        { member: "a", relative: "b", type: " " },
      ],
    });

    expect(result.success).toBe(false);
    expect(result.error?.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)).toEqual([
      "relationships.0.relative: a member cannot be related to themselves",
      "relationships.1.type: relationship type is required",
    ]);
  });
});
