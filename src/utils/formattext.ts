import type { TextPart } from "../models/session.js";

// 🔹 Regex compilados una sola vez
const boldRegex = /\*\*(.+?)\*\*/g;
const orderedItemRegex = /^\s*\d+[.)]\s+(.*)$/;
const bulletItemRegex = /^\s*[-*•]\s+(.*)$/;

function pushFormattedText(text: string): TextPart[] {
  const parts: TextPart[] = [];
  let lastIndex = 0;

  for (const match of text.matchAll(boldRegex)) {
    const offset = match.index ?? 0;
    if (offset > lastIndex) {
      parts.push({ type: "text", content: text.slice(lastIndex, offset) });
    }
    parts.push({ type: "bold", content: match[1] });
    lastIndex = offset + match[0].length;
  }

  if (lastIndex < text.length) {
    parts.push({ type: "text", content: text.slice(lastIndex) });
  }
  return parts;
}

/**
 * Divide el contenido de un mensaje en partes listas para pintar:
 * negritas, ítems de lista (los chistes numerados) y saltos de línea.
 */
export function parseMessageParts(text: string): TextPart[] {
  const parts: TextPart[] = [];
  const lines = text.replace(/\r\n/g, "\n").replace(/\n{3,}/g, "\n\n").split("\n");

  lines.forEach((rawLine, i) => {
    const line = rawLine.trimEnd();
    const ordered = orderedItemRegex.exec(line);
    const bullet = ordered ? null : bulletItemRegex.exec(line);

    if (ordered) {
      parts.push({ type: "listItem", content: ordered[1].replace(boldRegex, "$1"), ordered: true });
    } else if (bullet) {
      parts.push({ type: "listItem", content: bullet[1].replace(boldRegex, "$1"), ordered: false });
    } else if (line) {
      parts.push(...pushFormattedText(line));
    }

    // 🔹 Salto entre líneas, salvo después de la última
    if (i < lines.length - 1) {
      parts.push({ type: "break", content: "\n" });
    }
  });

  return parts;
}
