/**
 * Graph store access
 *
 * Concepts are `(:Concept {id, name})` nodes joined by `RELATES_TO`;
 * assignments appear as `(:Assignment {id, title})` proxy nodes pointing at
 * concepts through `ASSOCIATED_WITH`.
 *
 * @module services/graph/store
 */

import neo4j, { type Driver } from 'neo4j-driver';
import type { RagConfig } from '../../server/config.js';

export interface GraphEdgeRow {
  source_id: string;
  source_label: string;
  target_id: string;
  target_label: string;
}

export interface TopicTitlesRow {
  topic_id: string;
  label: string;
  titles: string[];
}

/** Queries available inside one graph session */
export interface GraphSession {
  /** Outgoing RELATES_TO edges whose source id is in `topics` */
  relatedEdges(topics: string[], maxEdges: number): Promise<GraphEdgeRow[]>;
  /** Up to `perTopic` assignment titles for each topic id, in input order */
  assignmentTitles(topicIds: string[], perTopic: number): Promise<TopicTitlesRow[]>;
}

export interface GraphStore {
  /** Run fn in a read session that is closed on every exit path */
  withSession<T>(fn: (session: GraphSession) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

const RELATED_EDGES_QUERY = `
MATCH (s:Concept)-[:RELATES_TO]->(t:Concept)
WHERE s.id IN $topics
RETURN s.id AS source_id,
       coalesce(s.name, s.id) AS source_label,
       t.id AS target_id,
       coalesce(t.name, t.id) AS target_label
LIMIT $limit
`;

const ASSIGNMENT_TITLES_QUERY = `
UNWIND $topicIds AS topicId
OPTIONAL MATCH (c:Concept {id: topicId})
OPTIONAL MATCH (a:Assignment)-[:ASSOCIATED_WITH]->(c)
WITH topicId, c, collect(DISTINCT a.title) AS titles
RETURN topicId AS topic_id,
       coalesce(c.name, topicId) AS label,
       titles[0..$perTopic] AS titles
`;

function asString(value: unknown): string {
  return typeof value === 'string' ? value : String(value);
}

function asStringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

export class Neo4jGraphStore implements GraphStore {
  constructor(
    private readonly driver: Driver,
    private readonly database?: string
  ) {}

  static connect(config: RagConfig['graph'] & { uri: string }): Neo4jGraphStore {
    const driver = neo4j.driver(config.uri, neo4j.auth.basic(config.user, config.password), {
      disableLosslessIntegers: true,
    });
    return new Neo4jGraphStore(driver, config.database);
  }

  async withSession<T>(fn: (session: GraphSession) => Promise<T>): Promise<T> {
    const session = this.driver.session({
      database: this.database,
      defaultAccessMode: neo4j.session.READ,
    });
    try {
      return await fn({
        relatedEdges: async (topics, maxEdges) => {
          const result = await session.run(RELATED_EDGES_QUERY, {
            topics,
            limit: neo4j.int(maxEdges),
          });
          return result.records.map((record) => ({
            source_id: asString(record.get('source_id')),
            source_label: asString(record.get('source_label')),
            target_id: asString(record.get('target_id')),
            target_label: asString(record.get('target_label')),
          }));
        },
        assignmentTitles: async (topicIds, perTopic) => {
          const result = await session.run(ASSIGNMENT_TITLES_QUERY, {
            topicIds,
            perTopic: neo4j.int(perTopic),
          });
          return result.records.map((record) => ({
            topic_id: asString(record.get('topic_id')),
            label: asString(record.get('label')),
            titles: asStringList(record.get('titles')),
          }));
        },
      });
    } finally {
      await session.close();
    }
  }

  async close(): Promise<void> {
    await this.driver.close();
  }
}
