import { createElement } from "react";
import { renderToStaticMarkup } from "react-dom/server";
import Markdown from "react-markdown";
import remarkGfm from "remark-gfm";

/**
 * Renders Gemini's Markdown reply to HTML for the page. Raw HTML in the
 * reply comes out as escaped text.
 */
export function renderRecipesHtml(markdown: string): string {
  if (!markdown.trim()) return "";
  return renderToStaticMarkup(
    createElement(Markdown, { remarkPlugins: [remarkGfm], children: markdown })
  );
}
