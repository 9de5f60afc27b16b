/**
 * Template Renderer
 *
 * Renders stack templates from the template store with Handlebars.
 * Templates are compiled in strict mode: a field the template references but
 * the parameters lack fails the whole render, so a document is either complete
 * or not produced at all. Output is YAML, so HTML escaping is off; use the
 * `quote` helper for values that need quoting.
 */

import Handlebars from 'handlebars'
import { TemplateExecutionError, TemplateParseError } from '../errors.js'
import type { TemplateStore } from './store.js'

type CompiledTemplate = (context: object) => string

/**
 * Double-quoted YAML scalar. JSON strings are valid YAML flow scalars.
 * Strict mode does not check helper arguments, so a missing value fails here.
 */
function quote(value: unknown): string {
  if (value === undefined || value === null) {
    throw new Error('quote: value is missing from the parameters')
  }
  return JSON.stringify(typeof value === 'string' ? value : String(value))
}

export class TemplateRenderer {
  private readonly handlebars = Handlebars.create()
  private readonly compiled = new Map<string, CompiledTemplate>()

  constructor(private readonly store: TemplateStore) {
    this.handlebars.registerHelper('quote', quote)
  }

  /**
   * Render template `name` against `parameters`.
   *
   * @throws TemplateNotFoundError if the store has no such template
   * @throws TemplateParseError if the template source is not valid Handlebars
   * @throws TemplateExecutionError if rendering fails, e.g. on a missing field
   */
  render(name: string, parameters: object): string {
    const template = this.compile(name)
    try {
      return template(parameters)
    } catch (error) {
      throw new TemplateExecutionError(name, error)
    }
  }

  private compile(name: string): CompiledTemplate {
    const cached = this.compiled.get(name)
    if (cached) {
      return cached
    }

    const source = this.store.find(name)
    let program: ReturnType<typeof Handlebars.parse>
    try {
      program = this.handlebars.parse(source)
    } catch (error) {
      throw new TemplateParseError(name, error)
    }

    const delegate = this.handlebars.compile(program, { strict: true, noEscape: true })
    const template: CompiledTemplate = context => delegate(context)
    this.compiled.set(name, template)
    return template
  }
}
