import Slugger from "github-slugger";
import hljs from "highlight.js";
import katex from "katex";
import { Marked, type RendererObject, type Token, type TokenizerAndRendererExtension } from "marked";
import { createRequire } from "module";

const require = createRequire(import.meta.url);
const emojis: Record<string, string> = require("markdown-it-emoji/lib/data/full.json");

const slugger = new Slugger();

const renderer: RendererObject = {
  heading(text, level, raw) {
    return `<h${level} id="${slugger.slug(raw)}">${text}</h${level}>\n`;
  },
  code(code, infostring) {
    const lang = (infostring ?? "").match(/^\S*/)?.[0] ?? "";
    if (lang === "math") {
      return `<p>${katex.renderToString(code, { displayMode: true, throwOnError: false })}</p>\n`;
    }
    const language = lang && hljs.getLanguage(lang) ? lang : "plaintext";
    return `<pre><code class="hljs language-${language}">${hljs.highlight(code, { language }).value}</code></pre>\n`;
  },
};

const math: TokenizerAndRendererExtension = {
  name: "math",
  level: "inline",
  start(src) {
    return src.match(/\$\$[^$]+?\$\$|\$[^$]+?\$/)?.index;
  },
  tokenizer(src) {
    const block = /^\$\$([^$]+?)\$\$/.exec(src);
    if (block) {
      return { type: "math", raw: block[0], text: block[1], tokens: [], display: true };
    }
    const inline = /^\$([^$]+?)\$/.exec(src);
    if (inline) {
      return { type: "math", raw: inline[0], text: inline[1], tokens: [], display: false };
    }
  },
  renderer(token) {
    return katex.renderToString(token.text, { displayMode: token.display, throwOnError: false });
  },
};

const footnoteList: TokenizerAndRendererExtension = {
  name: "footnoteList",
  level: "block",
  start(src) {
    return src.match(/^\[\^\d+\]:/m)?.index;
  },
  tokenizer(src) {
    const match = /^(?:\[\^(\d+)\]:[^\n]*(?:\n|$))+/.exec(src);
    if (match) {
      const text = match[0].trim();
      const tokens: Token[] = [];
      this.lexer.inline(text, tokens);
      return { type: "footnoteList", raw: match[0], text, tokens };
    }
  },
  renderer(token) {
    return `<section class="footnotes"><ol dir="auto">${this.parser.parseInline(token.tokens ?? [])}</ol></section>\n`;
  },
};

const footnote: TokenizerAndRendererExtension = {
  name: "footnote",
  level: "inline",
  start(src) {
    return src.match(/\[\^\d+\]/)?.index;
  },
  tokenizer(src) {
    const def = /^\[\^(\d+)\]:([^\n]*)(?:\n|$)/.exec(src);
    if (def) {
      return {
        type: "footnote",
        raw: def[0],
        id: Number(def[1]),
        tokens: this.lexer.inlineTokens(def[2].trim()),
        def: true,
      };
    }
    const ref = /^\[\^(\d+)\]/.exec(src);
    if (ref) {
      return { type: "footnote", raw: ref[0], id: Number(ref[1]), tokens: [], def: false };
    }
  },
  renderer(token) {
    const id: number = token.id;
    if (!token.def) {
      return `<sup><a href="#fn-${id}" data-footnote-ref="" id="fnref-${id}">${id}</a></sup>`;
    }
    const fragment = this.parser.parseInline(token.tokens ?? []);
    return `<li id="fn-${id}"><p dir="auto">${fragment} <a href="#fnref-${id}" class="data-footnote-backref" aria-label="Back to content">↩</a></p></li>`;
  },
};

const emoji: TokenizerAndRendererExtension = {
  name: "emoji",
  level: "inline",
  start(src) {
    return src.match(/:[a-zA-Z0-9_\-+]+:/)?.index;
  },
  tokenizer(src) {
    const match = /^:([a-zA-Z0-9_\-+]+):/.exec(src);
    if (match && Object.hasOwn(emojis, match[1])) {
      return { type: "emoji", raw: match[0], name: match[1], text: emojis[match[1]] };
    }
  },
  renderer(token) {
    return `<span class="emoji" title=":${token.name}:">${token.text}</span>`;
  },
};

const markdown = new Marked({
  gfm: true,
  extensions: [footnoteList, footnote, emoji, math],
  renderer,
});

/** Markdown to html. Heading ids are unique within one call. */
export function parse(text: string): string {
  slugger.reset();
  const html = markdown.parse(text, { async: false });
  if (typeof html !== "string") {
    throw new Error("markdown: unexpected async extension");
  }
  return html;
}
