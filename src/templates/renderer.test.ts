import { describe, it, expect, vi } from 'vitest'
import { TemplateRenderer } from './renderer.js'
import type { TemplateStore } from './store.js'
import {
  TemplateExecutionError,
  TemplateNotFoundError,
  TemplateParseError,
} from '../errors.js'

function storeOf(templates: Record<string, string>): TemplateStore {
  return {
    find: vi.fn((name: string) => {
      const template = templates[name]
      if (template === undefined) {
        throw new TemplateNotFoundError(name)
      }
      return template
    }),
  }
}

describe('TemplateRenderer', () => {
  it('should resolve dotted paths into the parameters', () => {
    const renderer = new TemplateRenderer(
      storeOf({ greeting: 'Hello {{app.name}} in {{env.name}}' })
    )

    const output = renderer.render('greeting', { app: { name: 'web' }, env: { name: 'test' } })

    expect(output).toBe('Hello web in test')
  })

  it('should not HTML-escape values', () => {
    const renderer = new TemplateRenderer(storeOf({ raw: 'value: {{value}}' }))

    expect(renderer.render('raw', { value: '<a & b>' })).toBe('value: <a & b>')
  })

  it('should quote values with the quote helper', () => {
    const renderer = new TemplateRenderer(storeOf({ quoted: 'path: {{quote path}}' }))

    expect(renderer.render('quoted', { path: '/api/"v1"' })).toBe('path: "/api/\\"v1\\""')
    expect(renderer.render('quoted', { path: 80 })).toBe('path: "80"')
  })

  it('should render maps with each', () => {
    const renderer = new TemplateRenderer(
      storeOf({ vars: '{{#each vars}}{{@key}}={{this}};{{/each}}' })
    )

    expect(renderer.render('vars', { vars: { A: '1', B: '2' } })).toBe('A=1;B=2;')
  })

  it('should fail on a field missing from the parameters', () => {
    const renderer = new TemplateRenderer(storeOf({ greeting: 'Hello {{app.missing}}' }))

    expect(() => renderer.render('greeting', { app: { name: 'web' } })).toThrow(
      TemplateExecutionError
    )
  })

  it('should fail on a missing parent object', () => {
    const renderer = new TemplateRenderer(storeOf({ greeting: 'Hello {{env.name}}' }))

    expect(() => renderer.render('greeting', { app: { name: 'web' } })).toThrow(
      /^Failed to execute template greeting: /
    )
  })

  it('should fail on a quoted field missing from the parameters', () => {
    const renderer = new TemplateRenderer(
      storeOf({ params: 'ProjectName: {{quote env.project}}' })
    )

    expect(() => renderer.render('params', { env: {} })).toThrow(TemplateExecutionError)
    expect(() => renderer.render('params', { env: {} })).toThrow(
      'Failed to execute template params: quote: value is missing from the parameters'
    )
  })

  it('should fail on a quoted null value', () => {
    const renderer = new TemplateRenderer(storeOf({ params: 'RulePath: {{quote path}}' }))

    expect(() => renderer.render('params', { path: null })).toThrow(TemplateExecutionError)
  })

  it('should fail on invalid template syntax', () => {
    const renderer = new TemplateRenderer(storeOf({ broken: 'Hello {{#each items}}' }))

    expect(() => renderer.render('broken', { items: [] })).toThrow(TemplateParseError)
  })

  it('should propagate a missing template', () => {
    const renderer = new TemplateRenderer(storeOf({}))

    expect(() => renderer.render('nope.yml', {})).toThrow(TemplateNotFoundError)
  })

  it('should render identical output for identical input', () => {
    const renderer = new TemplateRenderer(storeOf({ greeting: '{{a}}-{{b.c}}' }))
    const params = { a: 'x', b: { c: 2 } }

    expect(renderer.render('greeting', params)).toBe(renderer.render('greeting', params))
  })

  it('should read each template from the store once', () => {
    const store = storeOf({ greeting: '{{name}}' })
    const renderer = new TemplateRenderer(store)

    renderer.render('greeting', { name: 'a' })
    renderer.render('greeting', { name: 'b' })

    expect(store.find).toHaveBeenCalledTimes(1)
  })
})
