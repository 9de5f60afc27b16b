import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { LocalWorkspace } from './workspace.js'
import { WorkspaceError } from '../../errors.js'

describe('LocalWorkspace', () => {
  let tempDir: string
  let workspaceDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'workspace-test-'))
    workspaceDir = path.join(tempDir, 'stackpack')
    fs.mkdirSync(workspaceDir)
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  describe('discover', () => {
    it('should find the workspace from a nested directory', () => {
      const nested = path.join(tempDir, 'services', 'frontend')
      fs.mkdirSync(nested, { recursive: true })

      const workspace = LocalWorkspace.discover(nested)

      expect(workspace.dir).toBe(workspaceDir)
    })

    it('should fail when no parent holds a workspace', () => {
      const deep = path.join(tempDir, 'a', 'b', 'c', 'd', 'e', 'f', 'g')
      fs.mkdirSync(deep, { recursive: true })

      expect(() => LocalWorkspace.discover(deep)).toThrow(WorkspaceError)
    })
  })

  describe('listApplicationNames', () => {
    it('should list applications with a manifest, sorted', async () => {
      fs.writeFileSync(path.join(workspaceDir, 'frontend-app.yml'), '')
      fs.writeFileSync(path.join(workspaceDir, 'api-app.yml'), '')
      fs.writeFileSync(path.join(workspaceDir, 'notes.md'), '')
      fs.writeFileSync(path.join(workspaceDir, '-app.yml'), '')
      fs.mkdirSync(path.join(workspaceDir, 'old-app.yml'))

      const names = await new LocalWorkspace(workspaceDir).listApplicationNames()

      expect(names).toEqual(['api', 'frontend'])
    })

    it('should be empty for a fresh workspace', async () => {
      await expect(new LocalWorkspace(workspaceDir).listApplicationNames()).resolves.toEqual([])
    })
  })

  describe('manifests', () => {
    it('should name manifests after the application', () => {
      expect(new LocalWorkspace(workspaceDir).manifestFileName('frontend')).toBe('frontend-app.yml')
    })

    it('should read a manifest file', async () => {
      fs.writeFileSync(path.join(workspaceDir, 'frontend-app.yml'), 'name: frontend\n')
      const workspace = new LocalWorkspace(workspaceDir)

      const raw = await workspace.readManifestFile(workspace.manifestFileName('frontend'))

      expect(raw.toString('utf-8')).toBe('name: frontend\n')
    })

    it('should wrap a missing manifest', async () => {
      await expect(
        new LocalWorkspace(workspaceDir).readManifestFile('api-app.yml')
      ).rejects.toBeInstanceOf(WorkspaceError)
    })
  })

  describe('projectName', () => {
    it('should read the project from the summary', async () => {
      fs.writeFileSync(path.join(workspaceDir, '.workspace.json'), '{"project":"demo"}')

      await expect(new LocalWorkspace(workspaceDir).projectName()).resolves.toBe('demo')
    })

    it('should be undefined without a summary', async () => {
      await expect(new LocalWorkspace(workspaceDir).projectName()).resolves.toBeUndefined()
    })

    it('should reject a summary without a project', async () => {
      fs.writeFileSync(path.join(workspaceDir, '.workspace.json'), '{"name":"demo"}')

      await expect(new LocalWorkspace(workspaceDir).projectName()).rejects.toThrow(
        'does not name a project'
      )
    })
  })
})
