import type { Article, ArticleImpact, ArticleStore, EntityTags, Story } from "@newsdesk/db";

export interface ArticleDetail {
  article: Article;
  entityTags: EntityTags | null;
  impact: ArticleImpact | null;
  story: Story | null;
}

export function getArticleDetail(store: ArticleStore, id: number): ArticleDetail | null {
  const article = store.getArticle(id);
  if (!article) {
    return null;
  }

  return {
    article,
    entityTags: store.getEntityTags(id),
    impact: store.getImpact(id),
    story: findStoryOf(store.listStories(), id)
  };
}

export function findStoryOf(stories: readonly Story[], articleId: number): Story | null {
  return stories.find((story) => story.memberArticleIds.includes(articleId)) ?? null;
}
