/**
 * Minimal plain-text template engine.
 * Supports {{variable}} / {{ variable }} interpolation and
 * {{#if key}}...{{else}}...{{/if}} blocks. No HTML escaping: output is text/plain.
 */

type TemplateData = Readonly<Record<string, unknown>>;

function isTruthy(value: unknown): boolean {
  if (value == null) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  if (Array.isArray(value)) return value.length > 0;
  return Boolean(value);
}

function processConditionals(
  template: string,
  data: TemplateData,
): string {
  const ifRegex = /\{\{#if\s+(\w+)\s*\}\}([\s\S]*?)\{\{\/if\}\}/g;
  return template.replace(ifRegex, (_match, key: string, body: string) => {
    const [trueBranch, falseBranch = ''] = body.split(/\{\{else\}\}/);
    return isTruthy(data[key]) ? trueBranch : falseBranch;
  });
}

function interpolate(template: string, data: TemplateData): string {
  return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (_match, key: string) => {
    const value = data[key];
    return value == null ? '' : String(value);
  });
}

export function renderTemplate(
  template: string,
  data: TemplateData,
): string {
  return interpolate(processConditionals(template, data), data);
}
