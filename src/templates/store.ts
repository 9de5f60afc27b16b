import { existsSync, readFileSync, statSync } from 'fs'
import path from 'path'
import { fileURLToPath } from 'url'
import { TemplateNotFoundError } from '../errors.js'

/**
 * Read-only lookup of template sources by name, e.g. "lb-web-app/cf.yml".
 */
export interface TemplateStore {
  /** @throws TemplateNotFoundError if no template has this name */
  find(name: string): string
}

// templates/ ships at the package root, two levels up from both src/templates and dist/templates
export const BUNDLED_TEMPLATES_DIR = fileURLToPath(new URL('../../templates/', import.meta.url))

/**
 * Serves the templates bundled with the package. Each file is read at most once.
 */
export class BundledTemplateStore implements TemplateStore {
  private readonly root: string
  private readonly cache = new Map<string, string>()

  constructor(root: string = BUNDLED_TEMPLATES_DIR) {
    this.root = path.resolve(root)
  }

  find(name: string): string {
    const cached = this.cache.get(name)
    if (cached !== undefined) {
      return cached
    }

    const filePath = path.resolve(this.root, name)
    const relative = path.relative(this.root, filePath)
    if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new TemplateNotFoundError(name)
    }
    if (!existsSync(filePath) || !statSync(filePath).isFile()) {
      throw new TemplateNotFoundError(name)
    }

    let content: string
    try {
      content = readFileSync(filePath, 'utf-8')
    } catch (error) {
      throw new TemplateNotFoundError(name, error)
    }
    this.cache.set(name, content)
    return content
  }
}
