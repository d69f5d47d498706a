/**
 * Example: streaming a chat completion from Grok.
 *
 * This script demonstrates how to:
 *   1. Build a client from the XAI_API_KEY environment variable
 *   2. Build a request with the fluent ChatRequestBuilder
 *   3. Print deltas as they arrive and accumulate them into a response
 *   4. Ask for the model's pricing to estimate the cost of the call
 *
 * Usage:
 *   XAI_API_KEY=... npx tsx examples/stream-chat.ts "your prompt"
 */

import {
  ChatRequestBuilder,
  ChunkAccumulator,
  GrokClient,
  SDKError,
  calculateCost,
} from "@grok-grpc/client";

async function main(): Promise<void> {
  const prompt = process.argv[2] ?? "Explain gRPC deadlines in two sentences.";
  const client = GrokClient.fromEnv();

  try {
    const request = new ChatRequestBuilder()
      .system("You are a concise assistant.")
      .user(prompt)
      .withTemperature(0.3)
      .withMaxTokens(300)
      .build();

    // 1. Stream and print deltas
    const acc = new ChunkAccumulator();
    for await (const chunk of client.streamChat(request)) {
      process.stdout.write(chunk.delta);
      acc.process(chunk);
    }
    process.stdout.write("\n\n");

    // 2. Summarize the assembled response
    const response = acc.response();
    console.log(`Model: ${response.model}`);
    console.log(`Finish reason: ${response.finish_reason.reason}`);
    console.log(
      `Tokens: ${response.usage.prompt_tokens} in, ${response.usage.completion_tokens} out`,
    );

    // 3. Estimate cost from the model's published prices
    const model = await client.getModel(response.model);
    const cost = calculateCost(
      model,
      response.usage.prompt_tokens,
      response.usage.completion_tokens,
      response.usage.cached_prompt_tokens,
    );
    console.log(`Estimated cost: $${cost.toFixed(6)}`);
  } finally {
    client.close();
  }
}

main().catch((err: unknown) => {
  if (err instanceof SDKError) {
    console.error(`${err.name}: ${err.message} (retryable: ${err.retryable})`);
  } else {
    console.error("Example failed:", err);
  }
  process.exit(1);
});
