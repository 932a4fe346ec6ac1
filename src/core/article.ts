export type Article = {
  id: string;
  title: string;
  summary: string;
  source: string;
  link: string;
  publishedAt: string;
};

export const articleText = (article: Pick<Article, "title" | "summary">): string =>
  `${article.title} ${article.summary}`.trim();
