import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import {
  UnknownTemplateError,
  loadTemplates,
  planFromTemplate,
  resolveTemplate,
} from '../../src/core/templates.js';

describe('built-in templates', () => {
  it('ships the four task templates', async () => {
    const templates = await loadTemplates();
    expect(Object.keys(templates).sort()).toEqual(['debug', 'feature', 'project', 'refactor']);
  });

  it('instantiates a template with the task as context', async () => {
    const plan = await resolveTemplate('project', 'a todo app');

    expect(plan).toHaveLength(3);
    expect(plan.map((s) => s.context)).toEqual([
      'Task: a todo app',
      'Task: a todo app',
      'Task: a todo app',
    ]);
    expect(plan[1]).toMatchObject({ description: 'Initialize git repository', critical: false });
    expect(Object.isFrozen(plan)).toBe(true);
  });

  it('names the known templates for an unknown one', async () => {
    await expect(resolveTemplate('deploy', 'x')).rejects.toThrow(UnknownTemplateError);
    await expect(resolveTemplate('deploy', 'x')).rejects.toThrow(
      'Unknown task template "deploy" (available: project, feature, debug, refactor)',
    );
  });
});

describe('planFromTemplate', () => {
  it('keeps step context after the task line', () => {
    const plan = planFromTemplate(
      {
        summary: 's',
        steps: [{ description: 'd', instruction: 'i', context: 'use pnpm', critical: true }],
      },
      'build',
    );
    expect(plan[0]?.context).toBe('Task: build\nuse pnpm');
  });
});

describe('custom template files', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir !== undefined) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('loads templates from another file', async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'steprelay-templates-'));
    const file = path.join(dir, 'tasks.json');
    await writeFile(
      file,
      JSON.stringify({ release: { summary: 'Cut a release', steps: [{ instruction: 'tag it' }] } }),
    );

    const plan = await resolveTemplate('release', 'v1', file);
    expect(plan).toEqual([{ description: '', instruction: 'tag it', critical: true, context: 'Task: v1' }]);
  });

  it('rejects a template without steps', async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'steprelay-templates-'));
    const file = path.join(dir, 'tasks.json');
    await writeFile(file, JSON.stringify({ empty: { summary: 'Nothing', steps: [] } }));

    await expect(loadTemplates(file)).rejects.toThrow();
  });
});
