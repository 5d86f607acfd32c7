import type { ArtifactKind } from "../lib/types.ts";

export interface FilePrompt {
  path: string;
  kind: ArtifactKind;
  system: string;
  user: string;
}

interface FileSpec {
  path: string;
  kind: ArtifactKind;
  role: string;
  instructions: string;
}

const RAW_OUTPUT =
  "Reply with the file contents only. No markdown fences, no commentary before or after.";

const FILE_SPECS: FileSpec[] = [
  {
    path: "index.html",
    kind: "html",
    role: "You are a senior front-end engineer writing a small static web page.",
    instructions:
      "Write index.html. Link the stylesheet as styles.css and load script.js at the end of <body>. Use semantic, accessible markup and give the elements the ids and classes the brief implies.",
  },
  {
    path: "styles.css",
    kind: "css",
    role: "You are a senior front-end engineer writing the stylesheet of a small static web page.",
    instructions:
      "Write styles.css for the page index.html described by the brief. Keep it self-contained (no imports or external fonts) and responsive.",
  },
  {
    path: "script.js",
    kind: "js",
    role: "You are a senior front-end engineer writing the browser script of a small static web page.",
    instructions:
      "Write script.js for the page index.html described by the brief. Plain browser JavaScript, no modules, no build step, no external libraries. Wait for DOMContentLoaded before touching the page.",
  },
  {
    path: "README.md",
    kind: "readme",
    role: "You write concise, professional README files for small demo repositories.",
    instructions:
      "Write README.md for the repository. Include a one-paragraph summary, the files (index.html, styles.css, script.js), how to run it locally by opening index.html, and a License section naming the MIT license.",
  },
];

export function buildFilePrompts(opts: {
  task: string;
  brief: string;
}): FilePrompt[] {
  return FILE_SPECS.map((spec) => ({
    path: spec.path,
    kind: spec.kind,
    system: `${spec.role}\n${RAW_OUTPUT}`,
    user: [
      `Task: ${opts.task}`,
      `Brief: ${opts.brief}`,
      "",
      spec.instructions,
    ].join("\n"),
  }));
}
