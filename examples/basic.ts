/**
 * Basic usage example
 *
 * Event consumption: agent.subscribe() subscribes to typed events
 */

import { Agent } from "../src/index.js";

async function main() {
  const agent = await Agent.create();

  console.log("Little Helper Basic Example\n");

  // Subscribe to events (streaming text + tool calls)
  const unsubscribe = agent.subscribe((event) => {
    switch (event.type) {
      case "text_delta":
        process.stdout.write(event.delta);
        break;
      case "tool_start":
        console.log(`\n[Tool call: ${event.tool}]`);
        break;
      case "approval_queued":
        console.log(`\n[Waiting for approval: ${event.command}]`);
        break;
    }
  });

  // Example 1: Find mode
  console.log("--- Example 1: Find a file ---");
  const result1 = await agent.send("find", "Find my most recent PDF in Downloads");
  console.log(`\nDone: ${result1.iterations} iterations, ${result1.executedCommands.length} commands\n`);

  // Example 2: Fix mode, where risky commands wait on the queue
  console.log("--- Example 2: Check disk space ---");
  const result2 = await agent.send("fix", "How much disk space do I have left?");
  for (const pending of agent.pendingApprovals("fix")) {
    console.log(`Pending: ${pending.command} (${pending.level})`);
  }
  if (result2.error) console.log(`Error: ${result2.error.message}`);

  // Cleanup
  unsubscribe();
  agent.reset("find");
  agent.reset("fix");
}

main().catch(console.error);
