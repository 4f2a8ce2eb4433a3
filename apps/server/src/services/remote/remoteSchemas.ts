import { z } from "zod";

const cellSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
  z.object({ value: z.union([z.string(), z.number(), z.boolean(), z.null()]).optional() }).passthrough()
]);

export const statementStateSchema = z.enum(["PENDING", "RUNNING", "SUCCEEDED", "FAILED", "CANCELED", "CLOSED"]);

export const statementResponseSchema = z.object({
  statement_id: z.string(),
  status: z.object({
    state: statementStateSchema,
    error: z
      .object({
        error_code: z.string().optional(),
        message: z.string().optional()
      })
      .optional()
  }),
  manifest: z
    .object({
      schema: z.object({
        columns: z.array(z.object({ name: z.string() }).passthrough()).default([])
      })
    })
    .optional(),
  result: z
    .object({
      data_array: z.array(z.array(cellSchema)).optional()
    })
    .optional()
});

export type StatementResponse = z.infer<typeof statementResponseSchema>;
export type StatementCell = z.infer<typeof cellSchema>;

export const runNowResponseSchema = z.object({
  run_id: z.number().int()
});

export const lifeCycleStateSchema = z.enum([
  "QUEUED",
  "PENDING",
  "RUNNING",
  "TERMINATING",
  "TERMINATED",
  "SKIPPED",
  "INTERNAL_ERROR",
  "BLOCKED",
  "WAITING_FOR_RETRY"
]);

export const runStatusResponseSchema = z.object({
  state: z.object({
    life_cycle_state: lifeCycleStateSchema,
    result_state: z.string().optional(),
    state_message: z.string().optional()
  })
});

export const fileListingSchema = z.object({
  files: z
    .array(
      z.object({
        name: z.string(),
        path: z.string(),
        is_directory: z.boolean().default(false),
        file_size: z.number().optional()
      })
    )
    .default([])
});
