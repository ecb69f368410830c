export interface ReplyNode {
  messageId: number;
  replyToMessageId: number | null;
}

/**
 * Messages of one chat indexed by id. Reply links are looked up by id only,
 * so links to unknown messages, self-replies and cycles need no special case.
 */
export class ReplyForest {
  private readonly parent = new Map<number, number>();
  private readonly replyTo = new Map<number, number | null>();

  constructor(nodes: Iterable<ReplyNode> = []) {
    for (const node of nodes) {
      this.add(node);
    }
  }

  has(messageId: number): boolean {
    return this.parent.has(messageId);
  }

  get size(): number {
    return this.parent.size;
  }

  add(node: ReplyNode): void {
    if (!this.parent.has(node.messageId)) {
      this.parent.set(node.messageId, node.messageId);
    }
    this.replyTo.set(node.messageId, node.replyToMessageId);
  }

  private find(messageId: number): number {
    let root = messageId;
    let next = this.parent.get(root);
    while (next !== undefined && next !== root) {
      root = next;
      next = this.parent.get(root);
    }
    // Path compression
    let current = messageId;
    while (current !== root) {
      const up = this.parent.get(current);
      this.parent.set(current, root);
      if (up === undefined) {
        break;
      }
      current = up;
    }
    return root;
  }

  private union(a: number, b: number): void {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) {
      return;
    }
    // Smaller id becomes the root so component ids are stable
    if (rootA < rootB) {
      this.parent.set(rootB, rootA);
    } else {
      this.parent.set(rootA, rootB);
    }
  }

  /** Connected components keyed by their smallest message id, members ascending. */
  components(): Map<number, number[]> {
    for (const [messageId, target] of this.replyTo) {
      if (target !== null && this.parent.has(target)) {
        this.union(messageId, target);
      }
    }

    const groups = new Map<number, number[]>();
    for (const messageId of this.parent.keys()) {
      const root = this.find(messageId);
      const members = groups.get(root);
      if (members) {
        members.push(messageId);
      } else {
        groups.set(root, [messageId]);
      }
    }
    for (const members of groups.values()) {
      members.sort((a, b) => a - b);
    }
    return groups;
  }
}
