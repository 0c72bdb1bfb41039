import { Injectable, Logger } from '@nestjs/common';
import AdmZip from 'adm-zip';
import { XMLValidator } from 'fast-xml-parser';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { TemplateFillerPort } from '../../application/ports';
import type { FieldDict } from '../../domain/value-objects';
import { TemplateFillError } from '../../domain/errors';
import { fileExists } from '../../application/services/utils';

// parts that can hold visible text
const TEXT_PART_PATTERN = /^word\/(document|header\d*|footer\d*|footnotes|endnotes)\.xml$/;

// {{ key }}, allowing Word's run markup between any two characters
const PLACEHOLDER_PATTERN = /\{(?:<[^>]*>)*\{((?:<[^>]*>|[^<{}])*?)\}(?:<[^>]*>)*\}/g;

const PLACEHOLDER_KEY_PATTERN = /^[\p{L}\p{N}_.\-]+$/u;

function escapeXml(text: string): string {
  if (!text) return text;
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Placeholder key of a match, or null when the match is not a usable placeholder
 */
function placeholderKey(inner: string): string | null {
  if (inner.includes('</w:p>')) return null;
  const key = inner.replace(/<[^>]*>/g, '').trim();
  return PLACEHOLDER_KEY_PATTERN.test(key) ? key : null;
}

/**
 * .docx filler working directly on the WordprocessingML parts.
 * Runs spanned by a placeholder are merged into the first one.
 */
@Injectable()
export class DocxTemplateFillerAdapter implements TemplateFillerPort {
  private readonly logger = new Logger(DocxTemplateFillerAdapter.name);

  async fill(templatePath: string, fields: FieldDict, outputPath: string): Promise<string> {
    const zip = await this.openTemplate(templatePath);
    const missing = new Set<string>();

    for (const entry of this.textParts(zip)) {
      const xml = entry.getData().toString('utf-8');

      const filled = xml.replace(PLACEHOLDER_PATTERN, (match: string, inner: string) => {
        const key = placeholderKey(inner);
        if (key === null) return match;

        const value = fields.get(key);
        if (value === undefined) {
          missing.add(key);
          return '';
        }
        return escapeXml(value);
      });

      if (filled === xml) continue;

      const result = XMLValidator.validate(filled);
      if (result !== true) {
        throw new TemplateFillError(
          `Filled ${entry.entryName} is not well-formed XML (line ${result.err.line}: ${result.err.msg})`,
          templatePath,
        );
      }
      zip.updateFile(entry.entryName, Buffer.from(filled, 'utf-8'));
    }

    if (missing.size > 0) {
      this.logger.debug(`No value for placeholders ${[...missing].join(', ')}; left empty`);
    }

    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, zip.toBuffer());

    return outputPath;
  }

  async listPlaceholders(templatePath: string): Promise<string[]> {
    const zip = await this.openTemplate(templatePath);
    const keys = new Set<string>();

    for (const entry of this.textParts(zip)) {
      const xml = entry.getData().toString('utf-8');
      for (const match of xml.matchAll(PLACEHOLDER_PATTERN)) {
        const key = placeholderKey(match[1]);
        if (key !== null) keys.add(key);
      }
    }

    return [...keys];
  }

  private async openTemplate(templatePath: string): Promise<AdmZip> {
    if (!(await fileExists(templatePath))) {
      throw new TemplateFillError(`Template file not found: ${templatePath}`, templatePath);
    }

    let zip: AdmZip;
    let hasDocument: boolean;
    try {
      zip = new AdmZip(templatePath);
      hasDocument = zip.getEntry('word/document.xml') !== null;
    } catch (error) {
      throw new TemplateFillError(`Cannot open template ${templatePath} as a .docx archive`, templatePath, {
        cause: error,
      });
    }

    if (!hasDocument) {
      throw new TemplateFillError(`Template ${templatePath} has no word/document.xml`, templatePath);
    }

    return zip;
  }

  private textParts(zip: AdmZip): AdmZip.IZipEntry[] {
    return zip.getEntries().filter((entry) => !entry.isDirectory && TEXT_PART_PATTERN.test(entry.entryName));
  }
}
