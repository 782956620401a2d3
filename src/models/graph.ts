/**
 * Concept graph models returned alongside an answer
 *
 * @module models/graph
 */

export interface ConceptNode {
  topic_id: string;
  label: string;
  /** At most three assignment titles associated with the concept */
  related_assignment_titles: string[];
  /** True when the topic appears in the answer's own sources */
  is_primary: boolean;
}

/** Directed RELATES_TO edge between two concepts */
export interface ConceptEdge {
  source_topic_id: string;
  target_topic_id: string;
}

/**
 * Never empty: a request with no discovered concepts gets no graph at all.
 */
export interface GraphContext {
  nodes: ConceptNode[];
  edges: ConceptEdge[];
}
