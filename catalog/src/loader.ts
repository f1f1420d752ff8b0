/**
 * phpforge Catalog — Manifest Loader
 *
 * Reads a provisioning manifest from disk, validates it and resolves the
 * helper template path.
 *
 * Catalog structure:
 *   <catalog_dir>/
 *     manifest.yaml
 *     schema.json
 *     templates/
 *       php-helpers.zsh
 *
 * profile.template is relative to the manifest's directory, so a custom
 * manifest can ship its own template beside it.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { ManifestError, ProvisionManifest } from '@phpforge/engine';
import { validateManifest, ValidationError, ValidationResult } from './validator';

/** The manifest shipped with the catalog package */
export const BUNDLED_MANIFEST_PATH = path.join(__dirname, '..', 'manifest.yaml');

function fileError(filePath: string, message: string, rule: string): ValidationResult {
  return { valid: false, errors: [{ path: filePath, message, rule }] };
}

/**
 * Validate a manifest file: YAML syntax, schema, semantic rules and the
 * helper template. On success the returned manifest carries an absolute
 * template path.
 */
export function validateManifestFile(manifestPath: string): ValidationResult {
  if (!fs.existsSync(manifestPath)) {
    return fileError(manifestPath, 'Manifest file not found', 'file:exists');
  }

  let data: unknown;
  try {
    data = parseYaml(fs.readFileSync(manifestPath, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return fileError(manifestPath, `Invalid YAML: ${message}`, 'file:yaml');
  }

  const result = validateManifest(data);
  if (!result.manifest) return result;

  const manifest = result.manifest;
  const template = path.resolve(path.dirname(manifestPath), manifest.profile.template);
  const errors: ValidationError[] = [];

  if (!fs.existsSync(template)) {
    errors.push({
      path: '/profile/template',
      message: `Template not found: ${template}`,
      rule: 'file:template-exists',
    });
  } else {
    const content = fs.readFileSync(template, 'utf-8');
    for (const key of ['marker', 'verify'] as const) {
      if (!content.includes(manifest.profile[key])) {
        errors.push({
          path: `/profile/${key}`,
          message: `Template does not contain "${manifest.profile[key]}"`,
          rule: `file:template-${key}`,
        });
      }
    }
  }

  if (errors.length > 0) return { valid: false, errors };

  return {
    valid: true,
    errors,
    manifest: { ...manifest, profile: { ...manifest.profile, template } },
  };
}

/**
 * Load a manifest for provisioning.
 *
 * @throws ManifestError listing every validation error
 */
export function loadManifest(manifestPath: string = BUNDLED_MANIFEST_PATH): ProvisionManifest {
  const result = validateManifestFile(manifestPath);

  if (!result.manifest) {
    const summary = result.errors.map((e) => `${e.path}: ${e.message}`).join('; ');
    throw new ManifestError(`Invalid manifest ${manifestPath}: ${summary}`, {
      errors: result.errors,
    });
  }

  return result.manifest;
}
