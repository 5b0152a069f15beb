import Slugger from "github-slugger";
import hljs from "highlight.js";
import Katex from "katex";
import { Marked, type RendererObject, type TokenizerAndRendererExtension } from "marked";

function renderMath(text: string, displayMode: boolean) {
  return Katex.renderToString(text, { displayMode, throwOnError: false });
}

let math: TokenizerAndRendererExtension = {
  name: "math",
  level: "inline",
  start(src) {
    return src.match(/\$\$[^$]+?\$\$|\$[^$]+?\$/)?.index;
  },
  tokenizer(src) {
    const block = /^\$\$([^$]+?)\$\$/.exec(src);
    if (block) {
      return { type: "math", raw: block[0], text: block[1], display: true };
    }
    const inline = /^\$([^$]+?)\$/.exec(src);
    if (inline) {
      return { type: "math", raw: inline[0], text: inline[1], display: false };
    }
  },
  renderer(token) {
    return renderMath(String(token.text), Boolean(token.display));
  },
};

let footnoteList: TokenizerAndRendererExtension = {
  name: "footnoteList",
  level: "block",
  start(src) {
    return src.match(/^\[\^\d+\]:/m)?.index;
  },
  tokenizer(src) {
    const match = /^(?:\[\^\d+\]:[^\n]*(?:\n|$))+/.exec(src);
    if (match) {
      const text = match[0].trim();
      return { type: "footnoteList", raw: match[0], text, tokens: this.lexer.inline(text, []) };
    }
  },
  renderer(token) {
    return `<section class="footnotes"><ol>${this.parser.parseInline(token.tokens ?? [])}</ol></section>\n`;
  },
};

let footnote: TokenizerAndRendererExtension = {
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
        id: def[1],
        tokens: this.lexer.inlineTokens(def[2].trim(), []),
        def: true,
      };
    }
    const ref = /^\[\^(\d+)\]/.exec(src);
    if (ref) {
      return { type: "footnote", raw: ref[0], id: ref[1], tokens: [], def: false };
    }
  },
  renderer(token) {
    const id = String(token.id);
    if (!token.def) {
      return `<sup><a href="#fn-${id}" id="fnref-${id}" class="footnote-ref">${id}</a></sup>`;
    }
    const text = this.parser.parseInline(token.tokens ?? []);
    return `<li id="fn-${id}">${text} <a href="#fnref-${id}" class="footnote-backref" aria-label="Back to content">↩</a></li>`;
  },
};

/**
 * Creates a markdown to html converter with a fixed configuration.
 * Each converter owns its marked instance and heading slugger, so
 * converters never share state.
 */
export function createMarkdownParser(): (markdown: string) => string {
  const slugger = new Slugger();

  const renderer: RendererObject = {
    heading(text, level, raw) {
      return `<h${level} id="${slugger.slug(raw)}">${text}</h${level}>\n`;
    },
    code(code, infostring) {
      const lang = (infostring || "").match(/^\S*/)?.[0] ?? "";
      if (lang === "math") {
        return `<p>${renderMath(code, true)}</p>\n`;
      }
      const language = hljs.getLanguage(lang) ? lang : "plaintext";
      const html = hljs.highlight(code, { language }).value;
      return `<pre class="highlight"><code class="hljs language-${language}">${html}</code></pre>\n`;
    },
  };

  const marked = new Marked({
    gfm: true,
    extensions: [footnoteList, footnote, math],
    renderer,
  });

  return function parse(markdown: string) {
    slugger.reset();
    const html = marked.parse(markdown, { async: false });
    if (typeof html !== "string") {
      throw new Error("markdown renderer returned a promise");
    }
    return html;
  };
}
