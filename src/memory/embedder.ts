import { getPineconeClient } from "./pinecone.js";

// ── Embedder — Pinecone Inference ────────────────────────

/**
 * Embed a recall query with Pinecone's hosted multilingual-e5-large model.
 * Memory vectors are written by the synthesizer with the same model
 * (inputType "passage"); queries use inputType "query".
 */
export async function embedQuery(text: string): Promise<number[]> {
  const pc = getPineconeClient();

  const result = await pc.inference.embed({
    model: "multilingual-e5-large",
    inputs: [text.slice(0, 2000)],
    parameters: {
      inputType: "query",
      truncate: "END",
    },
  });

  const embedding = result.data?.[0];
  if (!embedding || !("values" in embedding) || !embedding.values) {
    throw new Error("Pinecone inference returned no embedding");
  }
  return embedding.values as number[];
}
