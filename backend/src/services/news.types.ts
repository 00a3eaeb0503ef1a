export interface NewsItem {
  title: string;
  published: string | null;
  link: string;
  description: string;
  source: string;
}
