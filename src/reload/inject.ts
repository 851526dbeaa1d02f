import { readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

const TEMPLATE_PATH = join(dirname(fileURLToPath(import.meta.url)), "client-template.html");

let cachedTemplate: string | null = null;

async function getTemplate(): Promise<string> {
  if (cachedTemplate === null) {
    cachedTemplate = await readFile(TEMPLATE_PATH, "utf-8");
  }
  return cachedTemplate;
}

export type ClientScriptOptions = {
  /** Port the browser connects to; `undefined` means the page's own port. */
  port?: number;
  path: string;
};

/**
 * The `<script>` block appended to every served HTML page. It connects to the
 * reload endpoint on the page's own hostname and reloads on each `reload`
 * message, and once more after reconnecting to a restarted server.
 */
export async function renderClientScript(options: ClientScriptOptions): Promise<string> {
  const template = await getTemplate();
  return template
    .replaceAll("{{port}}", options.port === undefined ? "" : String(options.port))
    .replaceAll("{{path}}", options.path);
}
