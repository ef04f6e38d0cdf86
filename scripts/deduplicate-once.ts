import { createNewsEngine } from "../apps/api/src/engine.js";

async function main() {
  const engine = createNewsEngine();
  try {
    const stories = await engine.deduplicateAll();
    // eslint-disable-next-line no-console
    console.log(
      JSON.stringify(
        {
          stories: stories.length,
          largest: Math.max(0, ...stories.map((story) => story.memberArticleIds.length))
        },
        null,
        2
      )
    );
  } finally {
    await engine.close();
  }
}

void main();
