// Node identifiers. Each graph (dynamic, systems, unified) owns its own id space;
// ids from another graph are lookups into that graph, never ownership.

export type NodeId = number;

export class NodeIdAllocator {
  #next: NodeId;

  constructor(start: NodeId = 1) {
    this.#next = start;
  }

  next(): NodeId {
    const id = this.#next;
    this.#next++;
    return id;
  }

  peek(): NodeId {
    return this.#next;
  }
}
