import { escapeXml } from "./text";
import type { AlignmentGroup } from "./types";

export const TEI_NS = "http://www.tei-c.org/ns/1.0";

export type CorpusHeader = {
  title: string;
  publisher: string;
  sourceDescription: string;
};

export const DEFAULT_CORPUS_HEADER: CorpusHeader = {
  title: "Aligned Parallel Texts",
  publisher: "Aligned with tei-align",
  sourceDescription: "Two independently encoded TEI documents with their cross-language correspondences."
};

export function renderLink(group: AlignmentGroup): string {
  const target = group.targets.map((id) => `#${id}`).join(" ");
  return `<link xml:id="${escapeXml(group.groupId)}" type="Linguistic" target="${escapeXml(target)}"/>`;
}

export function renderCorpusXml(params: {
  sourceLanguage: string;
  targetLanguage: string;
  groups: AlignmentGroup[];
  sourceRoot: string;
  targetRoot: string;
  header?: CorpusHeader;
  /** Internal-subset declarations the embedded documents rely on. */
  entityDeclarations?: string[];
}): string {
  const header = params.header ?? DEFAULT_CORPUS_HEADER;
  const declarations = params.entityDeclarations ?? [];
  const doctype = declarations.length
    ? `<!DOCTYPE teiCorpus [\n${declarations.map((d) => `  ${d}\n`).join("")}]>\n`
    : "";
  const src = escapeXml(params.sourceLanguage);
  const tgt = escapeXml(params.targetLanguage);

  const links = params.groups.map((g) => `      ${renderLink(g)}\n`).join("");
  const linkGrp = links
    ? `    <linkGrp type="translation">\n${links}    </linkGrp>`
    : `    <linkGrp type="translation"/>`;

  return `<?xml version="1.0" encoding="UTF-8"?>
${doctype}<teiCorpus xmlns="${TEI_NS}">
  <teiHeader>
    <fileDesc>
      <titleStmt>
        <title>${escapeXml(header.title)}</title>
      </titleStmt>
      <publicationStmt>
        <p>${escapeXml(header.publisher)}</p>
      </publicationStmt>
      <sourceDesc>
        <p>${escapeXml(header.sourceDescription)}</p>
      </sourceDesc>
    </fileDesc>
    <profileDesc>
      <langUsage>
        <language ident="${src}">Source language: ${src}</language>
        <language ident="${tgt}">Target language: ${tgt}</language>
      </langUsage>
    </profileDesc>
  </teiHeader>
  <standOff>
${linkGrp}
  </standOff>
${params.sourceRoot}
${params.targetRoot}
</teiCorpus>
`;
}
