export type ChatRole = "user" | "assistant" | "system";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type AnswerLanguage = "zh" | "en";

export type QueryRequest = {
  query: string;
  history?: ChatMessage[];
  user_id?: string;
  context?: string;
  max_answers: number;
  include_kg_paths: boolean;
  include_evidence: boolean;
  language: AnswerLanguage;
};

export type SourceType =
  | "pubmed"
  | "guideline"
  | "drugbank"
  | "knowledge_graph"
  | "clinical_trial"
  | "who"
  | "other";

export type Evidence = {
  source: string;
  source_type: SourceType;
  snippet: string;
  pmid: string | null;
  doi: string | null;
  url: string | null;
  confidence: number;
  publication_date: string | null;
  section: string | null;
};

export type KGNode = {
  id: string;
  label: string;
  type: string;
  properties: Record<string, unknown>;
};

export type KGEdge = {
  source: string;
  target: string;
  type: string;
  properties: Record<string, unknown>;
};

export type KGPath = {
  nodes: KGNode[];
  edges: KGEdge[];
  relevance_score: number;
  source: string;
  confidence: number;
};

export type AnswerSource = "knowledge_graph" | "llm_only" | "mixed" | "template";

export type QueryResponse = {
  query_id: string;
  answer: string;
  answer_source: AnswerSource;
  evidence: Evidence[];
  kg_paths: KGPath[];
  confidence_score: number;
  warnings: string[];
  disclaimer: string;
  processing_time_ms: number;
  model_used: string;
};

export type StreamEvent =
  | { status: "searching"; message: string }
  | { status: "evidence_found"; count: number }
  | { status: "generating"; message: string }
  | { status: "content"; text: string }
  | { status: "complete"; response: QueryResponse }
  | { status: "error"; message: string };

export type MemoryHit = {
  id: string;
  user_id: string | null;
  content: string;
  metadata: Record<string, unknown>;
  score: number;
};

export type NodeSummary = {
  id: string;
  label: string;
  type: string;
  properties: Record<string, unknown>;
};

export type NeighborNode = {
  id: string;
  label: string;
  type: string;
  relationship: string;
  direction: "incoming" | "outgoing";
};

export type NodeNeighborsResponse = {
  node: NodeSummary;
  neighbors: NeighborNode[];
  total_neighbors: number;
};

export type GraphStatsResponse = {
  total_nodes: number;
  total_relationships: number;
  node_types: Record<string, number>;
  relationship_types: Record<string, number>;
};

export type GraphViewNode = {
  id: string;
  label: string;
  type: string;
  color: string;
};

export type GraphViewEdge = {
  source: string;
  target: string;
  type: string;
};

export type GraphView = {
  nodes: GraphViewNode[];
  edges: GraphViewEdge[];
};

export type FeedbackType = "helpful" | "not_helpful" | "incorrect" | "missing_info" | "other";

export type FeedbackRequest = {
  query_id: string;
  feedback_type: FeedbackType;
  rating?: number;
  comment?: string;
  user_id?: string;
  suggested_answer?: string;
};

export type FeedbackResponse = {
  feedback_id: string;
  status: "received";
  message: string;
  created_at: string;
};

export type FeedbackStatsResponse = {
  total: number;
  by_type: Record<string, number>;
  average_rating: number | null;
};

export type SessionRecord = {
  session_id: string;
  title: string;
  session: Record<string, unknown>;
  updated_at: string;
};
