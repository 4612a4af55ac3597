import type { KGEdge, KGNode, KGPath } from "../types.js";
import type { DiseaseRecord, GraphStore } from "./graph-store.js";

export type DiseaseProfile = DiseaseRecord & {
  symptoms: string[];
  common_drugs: string[];
  recommended_drugs: string[];
  do_eat: string[];
  not_eat: string[];
  recommended_foods: string[];
  checks: string[];
  departments: string[];
  cure_ways: string[];
  complications: string[];
};

export type GraphKnowledge = {
  loadDiseaseProfile(name: string): Promise<DiseaseProfile | null>;
  findGraphPaths(entities: string[]): Promise<KGPath[]>;
  renderGraphContext(entities: string[]): Promise<string>;
};

const MAX_PATH_ENTITIES = 5;
const MAX_PATHS = 5;
const MAX_CONTEXT_ENTITIES = 3;
const SYMPTOM_DISEASE_LIMIT = 20;

function truncate(text: string, maxChars: number): string {
  return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text;
}

function list(values: string[], max: number): string {
  return values.slice(0, max).join(", ");
}

// Profiles are memoised for the lifetime of one instance, so create one per request.
export function createGraphKnowledge(store: GraphStore): GraphKnowledge {
  const profiles = new Map<string, Promise<DiseaseProfile | null>>();
  const symptomDiseases = new Map<string, Promise<string[]>>();

  async function fetchProfile(name: string): Promise<DiseaseProfile | null> {
    if (!store.isConnected()) {
      return null;
    }
    let record = await store.getRecord(name);
    if (!record) {
      const [match] = await store.search(name, "Disease", 1);
      if (match) {
        record = await store.getRecord(match);
      }
    }
    if (!record) {
      return null;
    }

    const canonical = record.name;
    const [
      symptoms,
      commonDrugs,
      recommendedDrugs,
      doEat,
      notEat,
      recommendedFoods,
      checks,
      departments,
      cureWays,
      complications,
    ] = await Promise.all([
      store.getRelated(canonical, "has_symptom"),
      store.getRelated(canonical, "common_drug"),
      store.getRelated(canonical, "recommand_drug"),
      store.getRelated(canonical, "do_eat"),
      store.getRelated(canonical, "no_eat"),
      store.getRelated(canonical, "recommand_eat"),
      store.getRelated(canonical, "need_check"),
      store.getRelated(canonical, "belongs_to"),
      store.getRelated(canonical, "cure_way"),
      store.getRelated(canonical, "acompany_with"),
    ]);

    return {
      ...record,
      symptoms,
      common_drugs: commonDrugs,
      recommended_drugs: recommendedDrugs,
      do_eat: doEat,
      not_eat: notEat,
      recommended_foods: recommendedFoods,
      checks,
      departments,
      cure_ways: cureWays,
      complications,
    };
  }

  function loadDiseaseProfile(name: string): Promise<DiseaseProfile | null> {
    let pending = profiles.get(name);
    if (!pending) {
      pending = fetchProfile(name);
      profiles.set(name, pending);
    }
    return pending;
  }

  function diseasesWithSymptom(symptom: string): Promise<string[]> {
    let pending = symptomDiseases.get(symptom);
    if (!pending) {
      pending = store.getRelated(symptom, "has_symptom", "incoming", SYMPTOM_DISEASE_LIMIT);
      symptomDiseases.set(symptom, pending);
    }
    return pending;
  }

  return {
    loadDiseaseProfile,

    async findGraphPaths(entities) {
      if (!store.isConnected()) {
        return [];
      }
      const paths: KGPath[] = [];
      // Several entities can resolve to one canonical disease; each root is emitted once.
      const roots = new Set<string>();

      for (const entity of entities.slice(0, MAX_PATH_ENTITIES)) {
        const profile = await loadDiseaseProfile(entity);
        if (profile && profile.description) {
          const rootId = `disease_${profile.name}`;
          if (roots.has(rootId)) {
            continue;
          }
          roots.add(rootId);
          const nodes: KGNode[] = [
            {
              id: rootId,
              label: profile.name,
              type: "Disease",
              properties: {
                description: profile.description,
                cause: profile.cause,
                prevent: profile.prevent,
              },
            },
          ];
          const edges: KGEdge[] = [];

          for (const symptom of profile.symptoms.slice(0, 5)) {
            nodes.push({ id: `symptom_${symptom}`, label: symptom, type: "Symptom", properties: {} });
            edges.push({ source: rootId, target: `symptom_${symptom}`, type: "has_symptom", properties: { name: "症状" } });
          }
          for (const drug of [...profile.common_drugs, ...profile.recommended_drugs].slice(0, 3)) {
            nodes.push({ id: `drug_${drug}`, label: drug, type: "Drug", properties: {} });
            edges.push({ source: rootId, target: `drug_${drug}`, type: "common_drug", properties: { name: "常用药品" } });
          }

          paths.push({ nodes, edges, relevance_score: 0.9, source: "neo4j", confidence: 0.9 });
          continue;
        }

        const diseases = await diseasesWithSymptom(entity);
        if (diseases.length > 0 && !roots.has(`symptom_${entity}`)) {
          const rootId = `symptom_${entity}`;
          roots.add(rootId);
          const nodes: KGNode[] = [{ id: rootId, label: entity, type: "Symptom", properties: {} }];
          const edges: KGEdge[] = [];
          for (const disease of diseases.slice(0, 5)) {
            nodes.push({ id: `disease_${disease}`, label: disease, type: "Disease", properties: {} });
            edges.push({ source: `disease_${disease}`, target: rootId, type: "has_symptom", properties: { name: "症状" } });
          }
          paths.push({ nodes, edges, relevance_score: 0.8, source: "neo4j", confidence: 0.8 });
        }
      }

      return paths.slice(0, MAX_PATHS);
    },

    async renderGraphContext(entities) {
      if (!store.isConnected()) {
        return "";
      }
      const parts: string[] = [];
      const rendered = new Set<string>();

      for (const entity of entities.slice(0, MAX_CONTEXT_ENTITIES)) {
        const profile = await loadDiseaseProfile(entity);
        if (profile && profile.description) {
          if (rendered.has(profile.name)) {
            continue;
          }
          rendered.add(profile.name);
          let block = `\n【${profile.name}】\n`;
          block += `简介：${profile.description}\n`;
          if (profile.symptoms.length > 0) {
            block += `症状：${list(profile.symptoms, 10)}\n`;
          }
          if (profile.cause) {
            block += `病因：${truncate(profile.cause, 200)}\n`;
          }
          if (profile.prevent) {
            block += `预防：${truncate(profile.prevent, 200)}\n`;
          }
          if (profile.departments.length > 0) {
            block += `就诊科室：${profile.departments.join(", ")}\n`;
          }
          if (profile.cure_ways.length > 0) {
            block += `治疗方法：${list(profile.cure_ways, 5)}\n`;
          }
          const drugs = [...profile.common_drugs, ...profile.recommended_drugs];
          if (drugs.length > 0) {
            block += `常用药物：${list(drugs, 8)}\n`;
          }
          if (profile.do_eat.length > 0) {
            block += `宜吃食物：${list(profile.do_eat, 5)}\n`;
          }
          if (profile.not_eat.length > 0) {
            block += `忌吃食物：${list(profile.not_eat, 5)}\n`;
          }
          if (profile.checks.length > 0) {
            block += `检查项目：${list(profile.checks, 5)}\n`;
          }
          if (profile.complications.length > 0) {
            block += `并发症：${list(profile.complications, 5)}\n`;
          }
          parts.push(block);
          continue;
        }

        const diseases = await diseasesWithSymptom(entity);
        if (diseases.length > 0) {
          parts.push(`\n【症状：${entity}】\n可能相关的疾病：${list(diseases, 10)}\n`);
        }
      }

      return parts.join("\n");
    },
  };
}

export function renderPathFallback(paths: KGPath[]): string {
  if (paths.length === 0) {
    return "";
  }
  let text = "相关医学知识：\n";
  for (const path of paths.slice(0, 3)) {
    for (const node of path.nodes) {
      text += `- ${node.type}: ${node.label}`;
      const description = node.properties.description;
      if (typeof description === "string" && description) {
        text += ` - ${description}`;
      }
      text += "\n";
    }
  }
  return text;
}
