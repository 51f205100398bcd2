import type { ZodIssue, ZodTypeAny, output } from "zod";

export type ServerActionErrorStatus =
  | "ERROR"
  | "INVALID_REQUEST"
  | "BAD_REQUEST"
  | "PAYLOAD_TOO_LARGE"
  | "NOT_FOUND"
  | "UNAUTHORIZED";

export type ServerActionError = {
  message: string;
  field?: string;
};

export type ServerActionResponse<T = unknown> =
  | {
      status: ServerActionErrorStatus;
      errors: ServerActionError[];
    }
  | {
      status: "OK";
      response: T;
    };

export const zodErrorsToServerActionErrors = (
  issues: ZodIssue[]
): ServerActionError[] => {
  return issues.map((issue) => {
    const field = issue.path.join(".");
    return field ? { message: issue.message, field } : { message: issue.message };
  });
};

export const serverActionError = (
  status: ServerActionErrorStatus,
  message: string,
  field?: string
): ServerActionResponse<never> => ({
  status,
  errors: [field ? { message, field } : { message }],
});

export const validateRequest = <S extends ZodTypeAny>(
  schema: S,
  value: unknown
): ServerActionResponse<output<S>> => {
  const validatedFields = schema.safeParse(value);

  if (!validatedFields.success) {
    return {
      status: "INVALID_REQUEST",
      errors: zodErrorsToServerActionErrors(validatedFields.error.errors),
    };
  }

  return {
    status: "OK",
    response: validatedFields.data,
  };
};
