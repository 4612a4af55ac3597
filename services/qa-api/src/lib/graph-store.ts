import neo4j, { isNode, type Driver, type Record as Neo4jRecord } from "neo4j-driver";

import type {
  GraphStatsResponse,
  GraphView,
  GraphViewEdge,
  GraphViewNode,
  NeighborNode,
  NodeNeighborsResponse,
  NodeSummary,
} from "../types.js";
import { errorMessage, type Logger } from "./logger.js";

export type SearchLabel = "Disease" | "Symptom";

export type DiseaseRelation =
  | "has_symptom"
  | "common_drug"
  | "recommand_drug"
  | "do_eat"
  | "no_eat"
  | "recommand_eat"
  | "need_check"
  | "belongs_to"
  | "cure_way"
  | "acompany_with";

export type RelationDirection = "outgoing" | "incoming";

export type DiseaseRecord = {
  name: string;
  description: string;
  cause: string;
  prevent: string;
  cure_time: string;
  cure_prob: string;
  easy_get: string;
};

export type GraphStore = {
  isConnected(): boolean;
  connect(): Promise<boolean>;
  close(): Promise<void>;
  search(keyword: string, label: SearchLabel, limit: number): Promise<string[]>;
  getRecord(name: string): Promise<DiseaseRecord | null>;
  // Outgoing: names reached from the disease. Incoming: diseases pointing at the named node.
  getRelated(name: string, relation: DiseaseRelation, direction?: RelationDirection, limit?: number): Promise<string[]>;
  neighbors(nodeId: string): Promise<NodeNeighborsResponse | null>;
  searchNodes(keyword: string, types: string[], limit: number): Promise<NodeSummary[]>;
  stats(): Promise<GraphStatsResponse>;
  graphData(limit: number): Promise<GraphView>;
};

export const NODE_LABELS = ["Disease", "Symptom", "Drug", "Food", "Check", "Department", "Cure", "Producer"] as const;

export const NODE_COLORS: Record<string, string> = {
  Disease: "#ef4444",
  Symptom: "#f97316",
  Drug: "#22c55e",
  Food: "#eab308",
  Check: "#3b82f6",
  Department: "#8b5cf6",
  Cure: "#14b8a6",
  Producer: "#6366f1",
};

export const DEFAULT_NODE_COLOR = "#6b7280";

export const RELATION_TARGETS: Record<DiseaseRelation, string> = {
  has_symptom: "Symptom",
  common_drug: "Drug",
  recommand_drug: "Drug",
  do_eat: "Food",
  no_eat: "Food",
  recommand_eat: "Food",
  need_check: "Check",
  belongs_to: "Department",
  cure_way: "Cure",
  acompany_with: "Disease",
};

const MODIFIER_WORDS = ["普通", "常见", "季节性", "一般", "常规"];

const FULLTEXT_INDEX = "kg_fulltext";

export function stripModifiers(keyword: string): string {
  let normalized = keyword;
  for (const word of MODIFIER_WORDS) {
    normalized = normalized.split(word).join("");
  }
  return normalized.trim();
}

export function emptyStats(): GraphStatsResponse {
  return {
    total_nodes: 0,
    total_relationships: 0,
    node_types: {},
    relationship_types: {},
  };
}

export function graphNodeId(type: string, name: string): string {
  return `${type.toLowerCase()}_${name}`;
}

// Keeps the first `limit` nodes and drops edges that reference a removed node.
export function capGraphView(view: GraphView, limit: number): GraphView {
  if (view.nodes.length <= limit) {
    return view;
  }
  const nodes = view.nodes.slice(0, limit);
  const allowed = new Set(nodes.map((node) => node.id));
  return {
    nodes,
    edges: view.edges.filter((edge) => allowed.has(edge.source) && allowed.has(edge.target)),
  };
}

function readString(record: Neo4jRecord, key: string): string | null {
  const value: unknown = record.get(key);
  return typeof value === "string" ? value : null;
}

function readNumber(record: Neo4jRecord, key: string): number {
  const value: unknown = record.get(key);
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

function readStringList(record: Neo4jRecord, key: string): string[] {
  const value: unknown = record.get(key);
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}

function asText(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => asText(item)).filter(Boolean).join("、");
  }
  return "";
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export type Neo4jGraphStoreOptions = {
  uri: string;
  user: string;
  password: string;
  logger: Logger;
};

export function createNeo4jGraphStore(options: Neo4jGraphStoreOptions): GraphStore {
  const { logger } = options;
  let driver: Driver | null = null;
  let connected = false;

  async function run(query: string, params: Record<string, unknown> = {}): Promise<Neo4jRecord[]> {
    if (!driver) {
      throw new Error("graph store is not connected");
    }
    const session = driver.session({ defaultAccessMode: neo4j.session.READ });
    try {
      const result = await session.run(query, params);
      return result.records;
    } finally {
      await session.close();
    }
  }

  async function names(query: string, params: Record<string, unknown>): Promise<string[]> {
    const records = await run(query, params);
    return records.map((record) => readString(record, "name")).filter((name): name is string => Boolean(name));
  }

  async function exactMatch(keyword: string, label: SearchLabel, limit: number): Promise<string[]> {
    return names(
      `MATCH (n:${label})
       WHERE n.name = $kw OR (n.alias IS NOT NULL AND any(a IN n.alias WHERE a = $kw))
       RETURN n.name AS name
       LIMIT $limit`,
      { kw: keyword, limit: neo4j.int(limit) },
    );
  }

  async function fulltextMatch(keyword: string, label: SearchLabel, limit: number): Promise<string[]> {
    return names(
      `CALL db.index.fulltext.queryNodes($index, $query) YIELD node, score
       WHERE $label IN labels(node)
       RETURN node.name AS name
       ORDER BY score DESC
       LIMIT $limit`,
      { index: FULLTEXT_INDEX, query: keyword, label, limit: neo4j.int(limit) },
    );
  }

  async function containsMatch(keyword: string, label: SearchLabel, limit: number): Promise<string[]> {
    return names(
      `MATCH (n:${label})
       WHERE n.name CONTAINS $kw OR (n.alias IS NOT NULL AND any(a IN n.alias WHERE a CONTAINS $kw))
       RETURN n.name AS name,
              CASE
                WHEN n.name = $kw THEN 0
                WHEN n.name STARTS WITH $kw THEN 1
                WHEN n.name CONTAINS $kw THEN 2
                ELSE 3
              END AS rank
       ORDER BY rank, n.name
       LIMIT $limit`,
      { kw: keyword, limit: neo4j.int(limit) },
    );
  }

  // Each tier is tried with the raw keyword and then with modifier words stripped.
  async function tier(
    label: SearchLabel,
    keywords: string[],
    limit: number,
    lookup: (keyword: string, label: SearchLabel, limit: number) => Promise<string[]>,
  ): Promise<string[]> {
    for (const keyword of keywords) {
      const hits = await lookup(keyword, label, limit);
      if (hits.length > 0) {
        return hits.slice(0, limit);
      }
    }
    return [];
  }

  return {
    isConnected() {
      return connected;
    },

    async connect() {
      try {
        driver = neo4j.driver(options.uri, neo4j.auth.basic(options.user, options.password), {
          disableLosslessIntegers: true,
        });
        await driver.verifyConnectivity();
        connected = true;
        const records = await run("MATCH (n:Disease) RETURN count(n) AS count");
        const diseases = records[0] ? readNumber(records[0], "count") : 0;
        logger.info({ uri: options.uri, diseases }, "connected to knowledge graph");
      } catch (error) {
        logger.warn({ err: errorMessage(error) }, "knowledge graph unavailable, graph features disabled");
        connected = false;
        if (driver) {
          await driver.close();
          driver = null;
        }
      }
      return connected;
    },

    async close() {
      connected = false;
      if (driver) {
        await driver.close();
        driver = null;
      }
    },

    async search(keyword, label, limit) {
      if (!connected) {
        return [];
      }
      const normalized = stripModifiers(keyword);
      const keywords = normalized && normalized !== keyword ? [keyword, normalized] : [keyword];

      try {
        const exact = await tier(label, keywords, limit, exactMatch);
        if (exact.length > 0) {
          return exact;
        }
      } catch (error) {
        logger.debug({ err: errorMessage(error), keyword }, "exact graph match failed");
      }

      try {
        const fulltext = await tier(label, keywords, limit, fulltextMatch);
        if (fulltext.length > 0) {
          return fulltext;
        }
      } catch (error) {
        logger.debug({ err: errorMessage(error), keyword }, "full-text query failed, index may be missing");
      }

      try {
        return await tier(label, keywords, limit, containsMatch);
      } catch (error) {
        logger.error({ err: errorMessage(error), keyword, label }, "graph search failed");
        return [];
      }
    },

    async getRecord(name) {
      if (!connected) {
        return null;
      }
      try {
        const records = await run(
          `MATCH (d:Disease {name: $name})
           RETURN d.name AS name, d.desc AS description, d.cause AS cause,
                  d.prevent AS prevent, d.cure_lasttime AS cure_time,
                  d.cured_prob AS cure_prob, d.easy_get AS easy_get
           LIMIT 1`,
          { name },
        );
        const record = records[0];
        if (!record) {
          return null;
        }
        return {
          name: readString(record, "name") ?? name,
          description: asText(record.get("description")),
          cause: asText(record.get("cause")),
          prevent: asText(record.get("prevent")),
          cure_time: asText(record.get("cure_time")),
          cure_prob: asText(record.get("cure_prob")),
          easy_get: asText(record.get("easy_get")),
        };
      } catch (error) {
        logger.error({ err: errorMessage(error), name }, "failed to load disease record");
        return null;
      }
    },

    async getRelated(name, relation, direction = "outgoing", limit = 100) {
      if (!connected) {
        return [];
      }
      const target = RELATION_TARGETS[relation];
      const query =
        direction === "outgoing"
          ? `MATCH (d:Disease {name: $name})-[:${relation}]->(t:${target}) RETURN t.name AS name LIMIT $limit`
          : `MATCH (d:Disease)-[:${relation}]->(t:${target} {name: $name}) RETURN d.name AS name LIMIT $limit`;
      try {
        return await names(query, { name, limit: neo4j.int(limit) });
      } catch (error) {
        logger.error({ err: errorMessage(error), name, relation }, "failed to load related nodes");
        return [];
      }
    },

    async neighbors(nodeId) {
      if (!connected) {
        return null;
      }
      try {
        const records = await run(
          `MATCH (n) WHERE n.name = $name
           OPTIONAL MATCH (n)-[r]-(m)
           RETURN n, collect({node: m, rel: type(r), outgoing: startNode(r) = n}) AS neighbors
           LIMIT 1`,
          { name: nodeId },
        );
        const record = records[0];
        const node: unknown = record?.get("n");
        if (!record || !isNode(node)) {
          return null;
        }

        const neighbors: NeighborNode[] = [];
        const rawNeighbors: unknown = record.get("neighbors");
        for (const entry of Array.isArray(rawNeighbors) ? rawNeighbors : []) {
          if (!isPlainRecord(entry)) {
            continue;
          }
          const neighbor = entry.node;
          if (!isNode(neighbor)) {
            continue;
          }
          const neighborName = asText(neighbor.properties.name) || "unknown";
          neighbors.push({
            id: neighborName,
            label: neighborName,
            type: neighbor.labels[0] ?? "Unknown",
            relationship: typeof entry.rel === "string" ? entry.rel : "related",
            direction: entry.outgoing === true ? "outgoing" : "incoming",
          });
        }

        const properties: Record<string, unknown> = { ...node.properties };
        return {
          node: {
            id: nodeId,
            label: asText(properties.name) || nodeId,
            type: node.labels[0] ?? "Unknown",
            properties,
          },
          neighbors,
          total_neighbors: neighbors.length,
        };
      } catch (error) {
        logger.error({ err: errorMessage(error), nodeId }, "failed to load node neighbors");
        return null;
      }
    },

    async searchNodes(keyword, types, limit) {
      if (!connected) {
        return [];
      }
      const results: NodeSummary[] = [];
      try {
        if (types.length > 0) {
          for (const type of types) {
            const records = await run(`MATCH (n:${type}) WHERE n.name CONTAINS $kw RETURN n LIMIT $limit`, {
              kw: keyword,
              limit: neo4j.int(limit),
            });
            for (const record of records) {
              const node: unknown = record.get("n");
              if (isNode(node)) {
                const name = asText(node.properties.name) || "unknown";
                results.push({ id: name, label: name, type, properties: { ...node.properties } });
              }
            }
          }
        } else {
          const records = await run(`MATCH (n) WHERE n.name CONTAINS $kw RETURN n LIMIT $limit`, {
            kw: keyword,
            limit: neo4j.int(limit),
          });
          for (const record of records) {
            const node: unknown = record.get("n");
            if (isNode(node)) {
              const name = asText(node.properties.name) || "unknown";
              results.push({
                id: name,
                label: name,
                type: node.labels[0] ?? "Unknown",
                properties: { ...node.properties },
              });
            }
          }
        }
      } catch (error) {
        logger.error({ err: errorMessage(error), keyword }, "node search failed");
      }
      return results.slice(0, limit);
    },

    async stats() {
      if (!connected) {
        return emptyStats();
      }
      const stats = emptyStats();
      try {
        for (const label of NODE_LABELS) {
          const records = await run(`MATCH (n:${label}) RETURN count(n) AS count`);
          const count = records[0] ? readNumber(records[0], "count") : 0;
          stats.node_types[label] = count;
          stats.total_nodes += count;
        }
        const relationships = await run("MATCH ()-[r]->() RETURN count(r) AS count");
        stats.total_relationships = relationships[0] ? readNumber(relationships[0], "count") : 0;
      } catch (error) {
        logger.error({ err: errorMessage(error) }, "failed to load graph statistics");
      }
      return stats;
    },

    async graphData(limit) {
      if (!connected) {
        return { nodes: [], edges: [] };
      }
      const nodes: GraphViewNode[] = [];
      const edges: GraphViewEdge[] = [];
      const seen = new Set<string>();
      const addNode = (name: string, type: string): string => {
        const id = graphNodeId(type, name);
        if (!seen.has(id)) {
          seen.add(id);
          nodes.push({ id, label: name, type, color: NODE_COLORS[type] ?? DEFAULT_NODE_COLOR });
        }
        return id;
      };

      try {
        const diseaseNames = await names("MATCH (d:Disease) RETURN d.name AS name LIMIT $limit", {
          limit: neo4j.int(limit),
        });
        if (diseaseNames.length > 0) {
          const records = await run(
            `MATCH (d:Disease)-[r]->(n)
             WHERE d.name IN $names
             RETURN d.name AS d_name, n.name AS n_name, labels(n) AS n_labels, type(r) AS rel_type`,
            { names: diseaseNames },
          );
          for (const record of records) {
            const source = addNode(readString(record, "d_name") ?? "unknown", "Disease");
            const targetType = readStringList(record, "n_labels")[0] ?? "Unknown";
            const target = addNode(readString(record, "n_name") ?? "unknown", targetType);
            edges.push({ source, target, type: readString(record, "rel_type") ?? "related" });
          }
        }
      } catch (error) {
        logger.error({ err: errorMessage(error) }, "failed to load graph view");
      }

      return capGraphView({ nodes, edges }, limit);
    },
  };
}
