/**
 * Graph Context Builder
 *
 * Expands the topics of the hydrated chunks into related concepts and the
 * assignments associated with them. Never fails a request: a missing or
 * unreachable graph store yields no context.
 *
 * @module services/graph/context-builder
 */

import type { ConceptEdge, ConceptNode, GraphContext } from '../../models/graph.js';
import { OneShotLog } from '../../utils/log-once.js';
import type { GraphSession, GraphStore } from './store.js';

export interface GraphContextOptions {
  maxEdges: number;
  titlesPerTopic: number;
}

export class GraphContextBuilder {
  private readonly warnings = new OneShotLog();

  /**
   * @param getStore - resolves the shared store; omitted when no graph store is configured
   */
  constructor(
    private readonly getStore: (() => Promise<GraphStore>) | undefined,
    private readonly options: GraphContextOptions
  ) {}

  async build(topics: Set<string>): Promise<GraphContext | undefined> {
    if (topics.size === 0 || !this.getStore) {
      return undefined;
    }

    try {
      const store = await this.getStore();
      return await store.withSession((session) => this.expand(session, topics));
    } catch (error) {
      this.warnings.warn(
        'unreachable',
        `[GraphContext] Graph store unavailable, answering without graph context: ${error instanceof Error ? error.message : String(error)}`
      );
      return undefined;
    }
  }

  private async expand(session: GraphSession, topics: Set<string>): Promise<GraphContext | undefined> {
    const nodes = new Map<string, ConceptNode>();
    const edges: ConceptEdge[] = [];
    const seenEdges = new Set<string>();

    const addNode = (topicId: string, label: string): void => {
      if (!nodes.has(topicId)) {
        nodes.set(topicId, {
          topic_id: topicId,
          label,
          related_assignment_titles: [],
          is_primary: topics.has(topicId),
        });
      }
    };

    const rows = await session.relatedEdges([...topics], this.options.maxEdges);
    for (const row of rows) {
      addNode(row.source_id, row.source_label);
      addNode(row.target_id, row.target_label);
      const key = `${row.source_id}\u0000${row.target_id}`;
      if (!seenEdges.has(key)) {
        seenEdges.add(key);
        edges.push({ source_topic_id: row.source_id, target_topic_id: row.target_id });
      }
    }

    const topicIds = [...new Set([...nodes.keys(), ...topics])];
    const titleRows = await session.assignmentTitles(topicIds, this.options.titlesPerTopic);
    for (const row of titleRows) {
      const titles = row.titles.slice(0, this.options.titlesPerTopic);
      const existing = nodes.get(row.topic_id);
      if (existing) {
        existing.related_assignment_titles = titles;
      } else if (topics.has(row.topic_id) && titles.length > 0) {
        addNode(row.topic_id, row.label);
        const added = nodes.get(row.topic_id);
        if (added) added.related_assignment_titles = titles;
      }
    }

    if (nodes.size === 0) {
      return undefined;
    }
    return { nodes: [...nodes.values()], edges };
  }
}
