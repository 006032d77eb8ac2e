/**
 * Custom skill example
 *
 * Registers a skill next to the built-ins; the model reaches it through
 * the use_skill tool (or a <skill> tag on text-only providers).
 */

import { Agent, createDefaultSkillRegistry, dataDir, textOutput, type Skill } from "../src/index.js";

// Custom skill: current time in a named timezone
const timeSkill: Skill = {
  descriptor: {
    id: "current_time",
    name: "Current Time",
    description: "Tell the current time. Params: timezone (e.g. America/New_York)",
    modes: ["find", "research"],
    permissionLevel: "Safe",
  },
  async execute(input) {
    const tz = typeof input.params.timezone === "string" ? input.params.timezone : "UTC";
    const now = new Date().toLocaleString("en-US", { timeZone: tz });
    return textOutput(`Current time (${tz}): ${now}`);
  },
};

async function main() {
  const skills = await createDefaultSkillRegistry({ dataDir: dataDir() });
  skills.register(timeSkill);
  const agent = await Agent.create({ skills });

  console.log("Custom Skill Example\n");

  const unsubscribe = agent.subscribe((event) => {
    switch (event.type) {
      case "text_delta":
        process.stdout.write(event.delta);
        break;
      case "tool_start":
        console.log(`\n[${event.tool}]`, event.intent ?? "");
        break;
      case "tool_result":
        console.log(`  -> ${event.content}`);
        break;
    }
  });

  const result = await agent.send("research", "What time is it in Tokyo right now?");
  console.log(`\n\nDone: ${result.iterations} iterations`);

  unsubscribe();
}

main().catch(console.error);
