import { v4 as uuidv4 } from "uuid";
import { contentHash, merkleRoot } from "../shared/hash.js";

/** Every operation a TableModel records. */
export type TransformOp =
  | "bind"
  | "applyFormat"
  | "mergeColumns"
  | "addSpanner"
  | "addRowGroup"
  | "hideColumns"
  | "setWidth"
  | "setAlignment"
  | "relabelColumns"
  | "indentRows"
  | "addFootnote"
  | "setMissingText"
  | "setFootnoteMarks"
  | "setTitle"
  | "setStubLabel";

export interface TransformEntry {
  traceId: string;
  tableId: string;
  op: TransformOp;
  position: number;
  /** Arguments after selectors were resolved to explicit ids. */
  params: Record<string, unknown>;
  /** Hash of the table state after the operation. */
  stateHash: string;
  hashChain: {
    contentHash: string;
    previousHash: string | null;
    merkleRoot: string;
  };
}

/**
 * Ordered, hash-chained record of the transformations applied to one table.
 * Declaration order of merges and footnotes is part of the output contract,
 * and this log is where that order can be audited.
 */
export class TransformLog {
  private chain: TransformEntry[];
  private readonly tableId: string;

  constructor(tableId: string, entries: TransformEntry[] = []) {
    this.tableId = tableId;
    this.chain = [...entries];
  }

  record(op: TransformOp, params: Record<string, unknown>, stateHash: string): TransformEntry {
    const position = this.chain.length;
    const previousHash = position > 0 ? this.chain[position - 1].hashChain.contentHash : null;

    const content = {
      traceId: uuidv4(),
      tableId: this.tableId,
      op,
      position,
      params,
      stateHash,
    };
    const cHash = contentHash(content);
    const mRoot = merkleRoot([...this.chain.map((e) => e.hashChain.contentHash), cHash]);

    const entry: TransformEntry = {
      ...content,
      hashChain: { contentHash: cHash, previousHash, merkleRoot: mRoot },
    };
    this.chain.push(entry);
    return entry;
  }

  entries(): TransformEntry[] {
    return [...this.chain];
  }

  /** Independent copy that shares no entries array with this log. */
  fork(): TransformLog {
    return new TransformLog(this.tableId, this.chain);
  }

  /** Validate positions, previous-hash links and content hashes. */
  validateChain(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    for (let i = 0; i < this.chain.length; i++) {
      const entry = this.chain[i];

      if (entry.position !== i) {
        errors.push(`Entry ${i}: position mismatch (expected ${i}, got ${entry.position})`);
      }
      if (i === 0 && entry.hashChain.previousHash !== null) {
        errors.push("Entry 0: previous hash should be null");
      }
      if (i > 0 && entry.hashChain.previousHash !== this.chain[i - 1].hashChain.contentHash) {
        errors.push(`Entry ${i}: previous hash does not match prior entry content hash`);
      }

      const { hashChain, ...content } = entry;
      if (hashChain.contentHash !== contentHash(content)) {
        errors.push(`Entry ${i}: content hash mismatch`);
      }
    }

    return { valid: errors.length === 0, errors };
  }
}
