import { readNested } from '~/shared/records'

export type TemplateContext = Record<string, unknown>

export const resolvePath = (value: TemplateContext, path: string) =>
  readNested(
    value,
    path
      .split('.')
      .map((part) => part.trim())
      .filter(Boolean),
  )

/**
 * Substitutes `{{ dotted.path }}` placeholders. Strings are inserted as-is, other values as
 * JSON (which YAML reads back as flow collections); unknown paths become ''.
 */
export const renderTemplate = (template: string, context: TemplateContext) =>
  template.replace(/\{\{\s*([^}]+?)\s*\}\}/g, (_match, path) => {
    const value = resolvePath(context, String(path))
    if (value == null) return ''
    return typeof value === 'string' ? value : JSON.stringify(value)
  })
