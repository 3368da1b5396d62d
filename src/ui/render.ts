import { VIEWS, type View } from '../core/types.js';
import type { AchievementRow, GameSnapshot, UpgradeRow } from '../state/snapshot.js';
import { bar, formatCooldown, formatNumber } from './format.js';

// ─── Frame rendering ───────────────────────────────────────────────────────

export interface RenderOptions {
  /** Emit ANSI colour codes */
  color?: boolean;
  /** Terminal height; the item list is windowed around the cursor to fit */
  rows?: number;
}

type Paint = (text: string) => string;

interface Palette {
  gold: Paint;
  rate: Paint;
  click: Paint;
  total: Paint;
  dim: Paint;
  bad: Paint;
  active: Paint;
}

const sgr =
  (open: string, close: string): Paint =>
  (text) =>
    `\x1b[${open}m${text}\x1b[${close}m`;

const ANSI: Palette = {
  gold: sgr('1;33', '22;39'),
  rate: sgr('32', '39'),
  click: sgr('36', '39'),
  total: sgr('35', '39'),
  dim: sgr('90', '39'),
  bad: sgr('31', '39'),
  active: sgr('1;7', '22;27'),
};

const plain: Paint = (text) => text;
const PLAIN: Palette = {
  gold: plain,
  rate: plain,
  click: plain,
  total: plain,
  dim: plain,
  bad: plain,
  active: plain,
};

const WIDTH = 64;
const LINES_PER_ITEM = 3;
/** Lines outside the item list: header, mining panel, tabs, list title, footer */
const FIXED_LINES = 15;

const TAB_TITLES: Record<View, string> = {
  passive: '1-Passive',
  click: '2-Click',
  achievements: '3-Achievements',
};

const HELP_FULL =
  'SPACE: Mine | Up/Down: Select | ENTER: Buy | 1-3: Tabs | H: Help | Q: Quit';
const HELP_SHORT = 'Press H for help | 1-3: Switch tabs | Q to quit';

/** Half-open range of list entries that fit, keeping the cursor in view. */
export function visibleWindow(count: number, selected: number, capacity: number): [number, number] {
  if (count <= capacity) return [0, count];
  const start = Math.min(Math.max(0, selected - capacity + 1), count - capacity);
  return [start, start + capacity];
}

export function renderFrame(snapshot: GameSnapshot, options: RenderOptions = {}): string[] {
  const p = options.color ? ANSI : PLAIN;
  const rule = '═'.repeat(WIDTH);
  const thin = '─'.repeat(WIDTH);
  const lines: string[] = [];

  lines.push(rule);
  lines.push(`  ${p.gold('TERMINAL GOLD MINE')}`);
  lines.push(
    `  Gold: ${p.gold(formatNumber(snapshot.gold))}` +
      ` | Rate: ${p.rate(`${formatNumber(snapshot.goldPerSecond)}/sec`)}` +
      ` | Click: +${p.click(formatNumber(snapshot.clickPower))}` +
      ` | Total: ${p.total(formatNumber(snapshot.totalGoldEarned))}`,
  );
  lines.push(rule);

  // Mining panel
  lines.push(`  ${p.gold('CLICK FOR GOLD!')}`);
  lines.push(
    `  Press SPACE to mine +${formatNumber(snapshot.clickPower)} gold` +
      ` (${formatCooldown(snapshot.clickCooldownMs)})`,
  );
  lines.push(`  Or just wait and earn ${p.rate(`${formatNumber(snapshot.goldPerSecond)} gold/sec`)}`);
  lines.push(
    `  Gold Progress ${bar(snapshot.goldProgress, 1)} ${(snapshot.goldProgress * 100).toFixed(1)}%`,
  );
  lines.push(thin);

  // Tabs
  const tabs = VIEWS.map((view) =>
    view === snapshot.currentView ? p.active(`[${TAB_TITLES[view]}]`) : ` ${TAB_TITLES[view]} `,
  );
  lines.push(`  ${tabs.join('  ')}`);
  lines.push(thin);

  const capacity = Math.max(1, Math.floor(((options.rows ?? Infinity) - FIXED_LINES) / LINES_PER_ITEM));

  if (snapshot.currentView === 'achievements') {
    lines.push(
      `  Achievements (${snapshot.completedCount}/${snapshot.achievementCount}) - Long-term Goals`,
    );
    const [start, end] = visibleWindow(snapshot.achievements.length, snapshot.selectedIndex, capacity);
    snapshot.achievements.slice(start, end).forEach((a, i) => {
      lines.push(...achievementLines(a, start + i === snapshot.selectedIndex, p));
    });
  } else {
    const title = snapshot.currentView === 'passive' ? 'Passive Upgrades' : 'Click Upgrades';
    lines.push(
      `  ${title} - Gold: ${formatNumber(snapshot.gold)} (Up/Down select, Enter buy)`,
    );
    const [start, end] = visibleWindow(snapshot.upgrades.length, snapshot.selectedIndex, capacity);
    snapshot.upgrades.slice(start, end).forEach((u, i) => {
      lines.push(...upgradeLines(u, start + i === snapshot.selectedIndex, p));
    });
  }

  lines.push(thin);
  lines.push(`  ${snapshot.showHelp ? HELP_FULL : HELP_SHORT}`);
  lines.push(rule);
  return lines;
}

function upgradeLines(u: UpgradeRow, selected: boolean, p: Palette): string[] {
  const cursor = selected ? '> ' : '  ';
  const unit = u.kind === 'passive' ? '/sec' : '/click';
  const cost = formatNumber(u.cost);
  return [
    `${cursor}${p.click(`${u.name} (${u.owned})`)}`,
    `    Cost: ${u.affordable ? p.rate(cost) : p.bad(`${cost} (need more gold)`)}` +
      ` | ${p.rate(`+${formatNumber(u.productionPerUnit)}${unit}`)}`,
    `    ${p.dim(u.description)}`,
  ];
}

function achievementLines(a: AchievementRow, selected: boolean, p: Palette): string[] {
  const cursor = selected ? '> ' : '  ';
  const status = a.completed ? '[DONE]' : '[    ]';
  const countGoal = a.goalKind === 'totalClicks' || a.goalKind === 'upgradesPurchased';
  const current = countGoal ? String(a.current) : formatNumber(a.current);
  const heading = `${status} ${a.name}`;
  return [
    `${cursor}${a.completed ? p.rate(heading) : p.gold(heading)}`,
    `    ${p.dim(a.description)}`,
    `    Progress: ${p.click(current)} / ${formatNumber(a.target)}`,
  ];
}
