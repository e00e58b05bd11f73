import { Pinecone } from "@pinecone-database/pinecone";
import { config } from "../config.js";

// ── Pinecone Client ───────────────────────────────────────

let _pc: Pinecone | null = null;
let _index: ReturnType<Pinecone["index"]> | null = null;

export function isPineconeConfigured(): boolean {
  return config.pineconeApiKey !== "" && config.pineconeIndex !== "";
}

/** Get the shared Pinecone client instance. */
export function getPineconeClient(): Pinecone {
  if (!_pc) {
    if (!config.pineconeApiKey) {
      throw new Error("PINECONE_API_KEY is not set");
    }
    _pc = new Pinecone({ apiKey: config.pineconeApiKey });
  }
  return _pc;
}

/** Get the Pinecone index holding one vector per memory (id = memory id). */
export function getPineconeIndex() {
  if (!_index) {
    if (!config.pineconeIndex) {
      throw new Error("PINECONE_INDEX is not set");
    }
    _index = getPineconeClient().index(config.pineconeIndex);
  }
  return _index;
}
