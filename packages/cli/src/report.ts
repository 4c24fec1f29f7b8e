import { z } from "zod";

const labelSchema = z
  .object({
    style: z.enum(["primary", "secondary"]).default("primary"),
    file: z.string().min(1),
    start: z.number().int().nonnegative(),
    end: z.number().int().nonnegative(),
    message: z.string().default("")
  })
  .refine((label) => label.start <= label.end, {
    message: "start must not be after end",
    path: ["end"]
  });

const diagnosticSchema = z.object({
  severity: z.enum(["bug", "error", "warning", "note", "help"]),
  code: z.string().optional(),
  message: z.string(),
  labels: z.array(labelSchema).default([]),
  notes: z.array(z.string()).default([])
});

export const reportSchema = z.object({
  diagnostics: z.array(diagnosticSchema)
});

export type Report = z.infer<typeof reportSchema>;
export type ReportDiagnostic = z.infer<typeof diagnosticSchema>;

export function parseReport(value: unknown, label: string): Report {
  const result = reportSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `  - ${location}: ${issue.message}`;
    });
    throw new Error(`Invalid report ${label}:\n${issues.join("\n")}`);
  }
  return result.data;
}
