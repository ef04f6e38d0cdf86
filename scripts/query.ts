import { createNewsEngine } from "../apps/api/src/engine.js";

const [text, k] = process.argv.slice(2);

async function main() {
  if (!text) {
    // eslint-disable-next-line no-console
    console.error('Usage: npm run query -- "<query text>" [k]');
    process.exit(1);
  }

  const engine = createNewsEngine();
  try {
    const result = await engine.query(text, k === undefined ? undefined : Number(k));
    // eslint-disable-next-line no-console
    console.log(
      JSON.stringify(
        {
          interpretation: result.interpretation,
          results: result.results.map((item) => ({
            id: item.article.id,
            title: item.article.title,
            score: Number(item.score.toFixed(4)),
            explanation: item.explanation
          }))
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
