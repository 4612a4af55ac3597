import type { Pool } from "pg";

import type { FeedbackRequest, FeedbackResponse, FeedbackStatsResponse } from "../types.js";
import { newId } from "./ids.js";

const THANKS = "感谢您的反馈！您的意见将帮助我们改进服务。";

type CountRow = {
  feedback_type: string;
  count: number | string;
};

type AverageRow = {
  average_rating: number | string | null;
};

export async function recordFeedback(db: Pool, feedback: FeedbackRequest): Promise<FeedbackResponse> {
  const feedbackId = newId("fb");
  const createdAt = new Date().toISOString();
  await db.query(
    `
      INSERT INTO feedback (
        id,
        query_id,
        feedback_type,
        rating,
        comment,
        user_id,
        suggested_answer,
        created_at
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8::timestamptz)
    `,
    [
      feedbackId,
      feedback.query_id,
      feedback.feedback_type,
      feedback.rating ?? null,
      feedback.comment ?? null,
      feedback.user_id ?? null,
      feedback.suggested_answer ?? null,
      createdAt,
    ],
  );

  return {
    feedback_id: feedbackId,
    status: "received",
    message: THANKS,
    created_at: createdAt,
  };
}

export async function getFeedbackStats(db: Pool): Promise<FeedbackStatsResponse> {
  const [counts, average] = await Promise.all([
    db.query<CountRow>(`SELECT feedback_type, COUNT(*) AS count FROM feedback GROUP BY feedback_type`),
    db.query<AverageRow>(`SELECT AVG(rating) AS average_rating FROM feedback WHERE rating IS NOT NULL`),
  ]);

  const byType: Record<string, number> = {};
  let total = 0;
  for (const row of counts.rows) {
    const count = Number(row.count);
    byType[row.feedback_type] = count;
    total += count;
  }

  // pg returns numeric aggregates as strings.
  const rawAverage = average.rows[0]?.average_rating;
  const averageRating = rawAverage === null || rawAverage === undefined ? null : Math.round(Number(rawAverage) * 100) / 100;

  return { total, by_type: byType, average_rating: averageRating };
}
