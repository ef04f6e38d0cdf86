import { z } from "zod";

export const MAX_SEARCH_K = 100;

export const queryInputSchema = z.object({
  text: z.string().trim().min(1, "Query text must not be empty"),
  k: z.number().int().min(1).max(MAX_SEARCH_K)
});

export type QueryInput = z.infer<typeof queryInputSchema>;

export class InvalidQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidQueryError";
  }
}

export function parseQueryInput(input: { text: string; k: number }): QueryInput {
  const result = queryInputSchema.safeParse(input);
  if (!result.success) {
    const formattedErrors = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new InvalidQueryError(`Invalid query: ${formattedErrors}`);
  }
  return result.data;
}
