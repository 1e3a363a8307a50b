// Lovelace dashboards and custom HTML dashboards

import { z } from 'zod';
import { HomeAssistantError } from '../errors.js';
import type { HomeAssistantApi } from '../services/homeAssistant.js';
import type { SnapshotStore } from '../services/snapshotStore.js';
import { asArray, asRecord, defineTool, fail, ok, type ToolOutcome } from './types.js';

const DEFAULT_DASHBOARD = 'lovelace';

function wsUrlPath(urlPath: string | undefined | null): string | null {
  return !urlPath || urlPath === DEFAULT_DASHBOARD ? null : urlPath;
}

/**
 * Cards across all views, including cards nested in sections.
 */
export function countCards(views: readonly unknown[]): number {
  let total = 0;
  for (const view of views) {
    const record = asRecord(view);
    total += asArray(record.cards).length;
    for (const section of asArray(record.sections)) {
      total += asArray(asRecord(section).cards).length;
    }
  }
  return total;
}

/**
 * Stored config of a dashboard, or null for one that was never saved.
 */
async function loadDashboardConfig(ha: HomeAssistantApi, urlPath: string | null): Promise<unknown> {
  try {
    return await ha.ws('lovelace/config', { url_path: urlPath });
  } catch (err) {
    if (err instanceof HomeAssistantError && err.code === 'config_not_found') return null;
    throw err;
  }
}

async function snapshotDashboard(ha: HomeAssistantApi, snapshots: SnapshotStore, urlPath: string | null): Promise<string> {
  const current = await loadDashboardConfig(ha, urlPath);
  const snapshot = await snapshots.save(
    `lovelace:${urlPath ?? DEFAULT_DASHBOARD}`,
    current === null ? null : JSON.stringify(current, null, 2),
  );
  return snapshot.id;
}

async function dashboardExists(ha: HomeAssistantApi, urlPath: string): Promise<boolean> {
  const dashboards = asArray(await ha.ws('lovelace/dashboards/list'));
  return dashboards.some((d) => asRecord(d).url_path === urlPath);
}

const viewsSchema = z.array(z.record(z.unknown())).describe('Views (tabs), each with title, path, icon and cards[].');

export const getDashboards = defineTool({
  name: 'get_dashboards',
  description: 'Get all Lovelace dashboards in Home Assistant.',
  access: 'read',
  input: z.object({}),
  async execute(_input, { ha }) {
    const dashboards = asArray(await ha.ws('lovelace/dashboards/list')).map((d) => {
      const record = asRecord(d);
      return { id: record.id, url_path: record.url_path, title: record.title, mode: record.mode };
    });
    return ok({ dashboards });
  },
});

export const getDashboardConfig = defineTool({
  name: 'get_dashboard_config',
  description: "Get the full configuration of a Lovelace dashboard. Read it before modifying. Use 'lovelace' for the default dashboard.",
  access: 'read',
  largeResult: true,
  input: z.object({
    url_path: z.string().optional(),
  }),
  async execute({ url_path }, { ha }) {
    const config = await ha.ws('lovelace/config', { url_path: wsUrlPath(url_path) });
    return ok({ url_path: url_path ?? DEFAULT_DASHBOARD, config });
  },
});

export const createDashboard = defineTool({
  name: 'create_dashboard',
  description:
    'Create a NEW Lovelace dashboard. Design the complete views and cards: gauges for percentages, history graphs for trends, tiles for controls.',
  access: 'write',
  input: z.object({
    title: z.string().min(1),
    url_path: z
      .string()
      .regex(/^[a-z0-9]+-[a-z0-9-]+$/, "lowercase slug containing a hyphen, e.g. 'energy-overview'"),
    icon: z.string().optional(),
    views: viewsSchema,
  }),
  async execute({ title, url_path, icon, views }, { ha, snapshots }) {
    if (await dashboardExists(ha, url_path)) {
      return fail(`Dashboard ${url_path} already exists. Use update_dashboard instead.`);
    }
    await ha.ws('lovelace/dashboards/create', {
      url_path,
      title,
      icon: icon ?? 'mdi:view-dashboard',
      mode: 'storage',
      show_in_sidebar: true,
      require_admin: false,
    });
    await snapshots.save(`lovelace:${url_path}`, null);
    await ha.ws('lovelace/config/save', { url_path, config: { title, views } });

    const cards = countCards(views);
    return ok(
      { url_path, title, views_count: views.length, cards_count: cards },
      { empty: views.length === 0 || cards === 0 },
    );
  },
});

export const updateDashboard = defineTool({
  name: 'update_dashboard',
  description:
    'Replace all views of an existing Lovelace dashboard. ALWAYS call get_dashboard_config first, then send the complete new views array.',
  access: 'write',
  input: z.object({
    url_path: z.string().optional(),
    views: viewsSchema,
  }),
  async execute({ url_path, views }, { ha, snapshots }) {
    const target = wsUrlPath(url_path);
    const snapshotId = await snapshotDashboard(ha, snapshots, target);
    const current = asRecord(await loadDashboardConfig(ha, target));
    await ha.ws('lovelace/config/save', { url_path: target, config: { ...current, views } });

    const cards = countCards(views);
    return ok(
      { url_path: target ?? DEFAULT_DASHBOARD, views_count: views.length, cards_count: cards, snapshot_id: snapshotId },
      { empty: views.length === 0 || cards === 0 },
    );
  },
});

export const deleteDashboard = defineTool({
  name: 'delete_dashboard',
  description: 'Delete a Lovelace dashboard by its id (from get_dashboards).',
  access: 'write',
  destructive: true,
  input: z.object({
    dashboard_id: z.string().min(1),
  }),
  async execute({ dashboard_id }, { ha, snapshots }) {
    const dashboards = asArray(await ha.ws('lovelace/dashboards/list')).map(asRecord);
    const match = dashboards.find((d) => d.id === dashboard_id || d.url_path === dashboard_id);
    if (!match) {
      return fail(`Dashboard ${dashboard_id} not found. Use get_dashboards to list them.`);
    }
    const urlPath = typeof match.url_path === 'string' ? match.url_path : dashboard_id;
    const snapshotId = await snapshotDashboard(ha, snapshots, urlPath);
    await ha.ws('lovelace/dashboards/delete', { dashboard_id: match.id });
    return ok({ deleted: urlPath, snapshot_id: snapshotId });
  },
});

export const getFrontendResources = defineTool({
  name: 'get_frontend_resources',
  description: 'List registered Lovelace frontend resources (custom cards such as mushroom, bubble-card, card-mod).',
  access: 'read',
  input: z.object({}),
  async execute(_input, { ha }) {
    const resources = asArray(await ha.ws('lovelace/resources')).map((r) => {
      const record = asRecord(r);
      return { url: record.url, type: record.type };
    });
    return ok({ resources });
  },
});

function withEntityList(html: string, entities: readonly string[]): string {
  if (entities.length === 0) return html;
  const script = `<script>window.DASHBOARD_ENTITIES = ${JSON.stringify(entities)};</script>`;
  return html.includes('</head>') ? html.replace('</head>', `${script}\n</head>`) : `${script}\n${html}`;
}

export const createHtmlDashboard = defineTool({
  name: 'create_html_dashboard',
  description:
    "Publish a custom HTML dashboard in the sidebar. Large pages can be sent in parts: draft 'start', then 'append' as often as needed, then 'finish'. Without draft the html is published at once.",
  access: 'write',
  input: z.object({
    name: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, "URL-safe slug, e.g. 'energy-flow'"),
    title: z.string().optional(),
    icon: z.string().optional(),
    html: z.string().optional().describe('Complete page, or the current chunk when drafting.'),
    draft: z.enum(['start', 'append', 'finish']).optional(),
    entities: z.array(z.string()).default([]).describe('Entity ids the page monitors.'),
  }),
  async execute({ name, title, icon, html, draft, entities }, deps): Promise<ToolOutcome> {
    const { ha, configFiles, snapshots, htmlDrafts } = deps;

    if (draft === 'start') {
      const length = htmlDrafts.start(name, html ?? '');
      return { success: true, partial: true, data: { status: 'draft_started', name, length } };
    }
    if (draft === 'append') {
      const length = htmlDrafts.append(name, html ?? '');
      if (length === null) {
        return fail(`No draft started for ${name}. Call with draft "start" first.`);
      }
      return { success: true, partial: true, data: { status: 'draft_appended', name, length } };
    }

    let page = html ?? '';
    if (draft === 'finish') {
      const assembled = htmlDrafts.take(name);
      if (assembled === null) {
        return fail(`No draft started for ${name}.`);
      }
      page = assembled + page;
    }
    if (page.trim().length === 0) {
      return fail('html is required');
    }

    const file = `www/dashboards/${name}.html`;
    const written = await configFiles.write(file, withEntityList(page, entities));

    const urlPath = `html-${name}`;
    const dashboardTitle = title ?? name;
    if (!(await dashboardExists(ha, urlPath))) {
      await ha.ws('lovelace/dashboards/create', {
        url_path: urlPath,
        title: dashboardTitle,
        icon: icon ?? 'mdi:web',
        mode: 'storage',
        show_in_sidebar: true,
        require_admin: false,
      });
    }
    await snapshotDashboard(ha, snapshots, urlPath);
    await ha.ws('lovelace/config/save', {
      url_path: urlPath,
      config: {
        title: dashboardTitle,
        views: [
          {
            title: dashboardTitle,
            path: name,
            panel: true,
            cards: [{ type: 'iframe', url: `/local/dashboards/${name}.html`, aspect_ratio: '100%' }],
          },
        ],
      },
    });

    return ok({ name, url_path: urlPath, file, bytes: written.bytes, snapshot_id: written.snapshot.id });
  },
});

export const dashboardTools = [
  getDashboards,
  getDashboardConfig,
  createDashboard,
  updateDashboard,
  deleteDashboard,
  getFrontendResources,
  createHtmlDashboard,
];
