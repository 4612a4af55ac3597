import { z } from "zod";

export const ChatMessageSchema = z
  .object({
    role: z.enum(["user", "assistant", "system"]),
    content: z.string(),
  })
  .strict();

export const QueryRequestSchema = z
  .object({
    query: z.string().trim().min(1).max(2000),
    history: z.array(ChatMessageSchema).max(50).optional(),
    user_id: z.string().trim().min(1).max(128).optional(),
    context: z.string().max(4000).optional(),
    max_answers: z.number().int().min(1).max(10).default(3),
    include_kg_paths: z.boolean().default(true),
    include_evidence: z.boolean().default(true),
    language: z.enum(["zh", "en"]).default("zh"),
  })
  .strict();

export const NodeTypeSchema = z.enum([
  "Disease",
  "Symptom",
  "Drug",
  "Food",
  "Check",
  "Department",
  "Cure",
  "Producer",
]);

export const KgSearchQuerySchema = z
  .object({
    q: z.string().trim().min(1),
    types: z
      .string()
      .optional()
      .transform((raw) =>
        (raw ?? "")
          .split(",")
          .map((item) => item.trim())
          .filter(Boolean),
      )
      .pipe(z.array(NodeTypeSchema)),
    limit: z.coerce.number().int().min(1).max(100).default(20),
  })
  .strict();

export const KgGraphQuerySchema = z
  .object({
    limit: z.coerce.number().int().min(50).max(500).default(100),
  })
  .strict();

export const ProviderIdSchema = z.enum(["template", "mock", "openai", "siliconflow", "gemini"]);

export const ProviderUpdateSchema = z
  .object({
    provider: z
      .string()
      .transform((value) => value.trim().toLowerCase())
      .pipe(ProviderIdSchema)
      .transform((value) => (value === "mock" ? "template" : value)),
    api_key: z.string().trim().min(1).optional(),
    model: z.string().trim().min(1).optional(),
    base_url: z.string().url().optional(),
  })
  .strict();

export const FeedbackRequestSchema = z
  .object({
    query_id: z.string().min(1),
    feedback_type: z.enum(["helpful", "not_helpful", "incorrect", "missing_info", "other"]),
    rating: z.number().int().min(1).max(5).optional(),
    comment: z.string().max(1000).optional(),
    user_id: z.string().min(1).optional(),
    suggested_answer: z.string().max(4000).optional(),
  })
  .strict();

export const SessionSaveRequestSchema = z
  .object({
    user_id: z.string().trim().min(1).max(128),
    session: z
      .object({
        id: z.string().min(1).optional(),
        title: z.string().optional(),
      })
      .passthrough(),
  })
  .strict();

export const KgNodeParamsSchema = z.object({
  nodeId: z.string().min(1),
});

export const SessionUserParamsSchema = z.object({
  userId: z.string().trim().min(1).max(128),
});

export const SessionParamsSchema = SessionUserParamsSchema.extend({
  sessionId: z.string().min(1),
});
