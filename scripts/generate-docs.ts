/*
 * Generates docs/API.md from the JSDoc of every exported symbol under src/.
 * - One section per source file, ordered by path
 * - Classes list their documented public methods and accessors
 * Usage: npm run docs
 */
import { Node, Project, type JSDoc, type SourceFile } from 'ts-morph';
import fg from 'fast-glob';
import * as path from 'path';
import fs from 'fs-extra';

const SRC_DIR = path.resolve('src');
const DOCS_DIR = path.resolve('docs');
const OUT_FILE = path.join(DOCS_DIR, 'API.md');

interface RenderedSymbol {
  kind: string;
  name: string;
  signature?: string;
  description?: string;
  params: { name: string; doc?: string }[];
  returns?: string;
  members: RenderedSymbol[];
}

const project = new Project({
  tsConfigFilePath: path.resolve('tsconfig.json'),
  skipAddingFilesFromTsConfig: true,
});

async function main() {
  await fs.ensureDir(DOCS_DIR);

  const filePaths = await fg(['**/*.ts'], {
    cwd: SRC_DIR,
    absolute: true,
    ignore: ['**/*.d.ts', '**/*.test.ts'],
  });
  for (const p of filePaths) project.addSourceFileAtPath(p);
  const sourceFiles = project
    .getSourceFiles()
    .filter((sf) => !/node_modules/.test(sf.getFilePath()));
  console.log(`[docs] Loaded ${sourceFiles.length} source files`);

  const sections = new Map<string, RenderedSymbol[]>();
  for (const sf of sourceFiles) {
    const rendered = renderFile(sf);
    if (rendered.length) sections.set(sf.getFilePath(), rendered);
  }

  const md = buildApiDoc(sections);
  await writeIfChanged(OUT_FILE, md);
  console.log(`[docs] Wrote ${path.relative(process.cwd(), OUT_FILE)}`);
}

function renderFile(sf: SourceFile): RenderedSymbol[] {
  const out: RenderedSymbol[] = [];
  const seen = new Set<Node>();
  for (const [exportName, decls] of sf.getExportedDeclarations()) {
    for (const decl of decls) {
      // re-exports resolve to the defining file; document them there
      if (decl.getSourceFile() !== sf || seen.has(decl)) continue;
      seen.add(decl);
      const name = exportName === 'default' ? nameOf(decl) ?? 'default' : exportName;
      const rendered = renderDeclaration(decl, name);
      if (!rendered) continue;
      if (Node.isClassDeclaration(decl)) {
        for (const member of decl.getMembers()) {
          if (Node.isMethodDeclaration(member) || Node.isGetAccessorDeclaration(member)) {
            if (member.hasModifier('private') || member.getName().startsWith('_')) continue;
            const child = renderDeclaration(member, member.getName());
            if (child) rendered.members.push(child);
          }
        }
      }
      out.push(rendered);
    }
  }
  return out.sort((a, b) => a.name.localeCompare(b.name));
}

function nameOf(node: Node): string | undefined {
  return node.getSymbol()?.getName();
}

function renderDeclaration(decl: Node, name: string): RenderedSymbol | null {
  if (!Node.isJSDocable(decl)) {
    // variables carry their JSDoc on the statement
    const statement = Node.isVariableDeclaration(decl)
      ? decl.getVariableStatement()
      : undefined;
    if (!statement) return null;
    return fromDocs(statement.getJsDocs(), decl, name);
  }
  return fromDocs(decl.getJsDocs(), decl, name);
}

function fromDocs(jsDocs: JSDoc[], decl: Node, name: string): RenderedSymbol | null {
  const primary = jsDocs[jsDocs.length - 1];
  if (!primary) return null;
  const tags = primary.getTags();
  if (tags.some((t) => t.getTagName() === 'internal')) return null;

  const params: { name: string; doc?: string }[] = [];
  let returns: string | undefined;
  for (const tag of tags) {
    if (Node.isJSDocParameterTag(tag))
      params.push({ name: tag.getName(), doc: tag.getCommentText()?.trim() });
    else if (tag.getTagName() === 'returns' || tag.getTagName() === 'return')
      returns = tag.getCommentText()?.trim();
  }

  let signature: string | undefined;
  const sig = decl.getType().getCallSignatures()[0];
  if (sig) {
    const args = sig
      .getParameters()
      .map((p) => `${p.getName()}: ${p.getTypeAtLocation(decl).getText(decl)}`)
      .join(', ');
    signature = `(${args}) => ${sig.getReturnType().getText(decl)}`;
  }

  return {
    kind: decl.getKindName(),
    name,
    signature,
    description: primary.getDescription().trim() || undefined,
    params,
    returns,
    members: [],
  };
}

function renderSymbol(lines: string[], s: RenderedSymbol, heading: string) {
  lines.push(`${heading} ${s.name}`);
  if (s.signature) lines.push('', '`' + s.signature + '`');
  if (s.description) lines.push('', s.description);
  if (s.params.length) {
    lines.push('', 'Parameters:');
    for (const p of s.params) lines.push(`- \`${p.name}\`${p.doc ? ' - ' + p.doc : ''}`);
  }
  if (s.returns) lines.push('', `Returns: ${s.returns}`);
  lines.push('');
}

function buildApiDoc(sections: Map<string, RenderedSymbol[]>) {
  const lines: string[] = ['# API', '', 'Generated from source JSDoc by `npm run docs`.', ''];
  for (const file of [...sections.keys()].sort()) {
    const relFile = path.relative(SRC_DIR, file).replace(/\\/g, '/');
    lines.push(`## ${relFile}`, '');
    for (const s of sections.get(file) ?? []) {
      renderSymbol(lines, s, '###');
      for (const m of s.members) renderSymbol(lines, m, '####');
    }
  }
  return lines.join('\n').trim() + '\n';
}

async function writeIfChanged(file: string, content: string) {
  if (await fs.pathExists(file)) {
    const prev = await fs.readFile(file, 'utf8');
    if (prev === content) return;
  }
  await fs.writeFile(file, content, 'utf8');
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
