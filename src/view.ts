import chalk, { type ChalkInstance } from 'chalk';
import { formatIdentity, isSameIdentity } from './identity';
import { listHeight, type FormState, type SessionState } from './session';
import type { StoredIdentity } from './types';

const TITLE = 'git-identities';
const FILTER_PLACEHOLDER = 'fuzzy filter (/, esc)';
const CURSOR = '█';

export const BROWSE_LEGEND =
  '↑/↓ move • enter/l set local • g set global • a add • e edit • del delete • / filter • ? help • q quit';
export const FILTER_LEGEND = 'type to filter • ↑/↓ move • enter apply • esc clear';
export const FORM_LEGEND = 'enter next field / save • tab next field • esc cancel';

export type ListWindow = { start: number; end: number };

/** Slice of `count` rows, at most `height` long, that keeps `selection` on screen. */
export const listWindow = (count: number, selection: number | undefined, height: number): ListWindow => {
  if (count <= height) {
    return { start: 0, end: count };
  }
  const anchor = selection ?? 0;
  const start = Math.min(Math.max(anchor - Math.floor(height / 2), 0), count - height);
  return { start, end: start + height };
};

const highlight = (text: string, positions: readonly number[], style: ChalkInstance): string => {
  if (positions.length === 0) return text;
  const marked = new Set(positions);
  return Array.from(text, (char, index) => (marked.has(index) ? style.bold.yellow(char) : char)).join('');
};

const authorMarkers = (state: SessionState, identity: StoredIdentity, style: ChalkInstance): string => {
  const markers: string[] = [];
  if (state.authors.global && isSameIdentity(state.authors.global, identity)) markers.push('[global]');
  if (state.authors.local && isSameIdentity(state.authors.local, identity)) markers.push('[local]');
  return markers.length > 0 ? ` ${style.green(markers.join(' '))}` : '';
};

const renderHeader = (state: SessionState, style: ChalkInstance): string => {
  let header = `${style.bold.cyan(TITLE)}  ${style.cyan(state.status)}`;
  if (state.error) {
    header += `  ${style.bold.red(`! ${state.error}`)}`;
  }
  return header;
};

const renderFilterLine = (state: SessionState, style: ChalkInstance): string => {
  const { query } = state.filter;
  if (state.filtering) {
    return `/ ${query}${CURSOR}`;
  }
  return query.length > 0 ? `  ${query}` : `  ${style.dim(FILTER_PLACEHOLDER)}`;
};

const renderList = (state: SessionState, style: ChalkInstance): string[] => {
  const { view, source, query } = state.filter;
  if (view.length === 0) {
    const empty = source.length === 0 ? '(no identities, press a to add one)' : '(no matches)';
    return [`  ${style.dim(empty)}`, ''];
  }

  const { start, end } = listWindow(view.length, state.selection, listHeight(state.viewport));
  const rows = view.slice(start, end).map((hit, offset) => {
    const selected = start + offset === state.selection;
    const text = highlight(formatIdentity(hit.item), hit.positions, style);
    const row = `${selected ? '› ' : '  '}${text}${authorMarkers(state, hit.item, style)}`;
    return selected ? style.bold(row) : row;
  });

  const position = state.selection === undefined ? 0 : state.selection + 1;
  const counter = query.trim().length > 0 ? `${position}/${view.length} of ${source.length}` : `${position}/${view.length}`;
  return [...rows, `  ${style.dim(counter)}`];
};

const renderField = (label: string, value: string, focused: boolean, style: ChalkInstance): string => {
  const marker = focused ? style.magenta('›') : ' ';
  return `${marker} ${label.padEnd(7)}${value}${focused ? CURSOR : ''}`;
};

const renderForm = (state: FormState, style: ChalkInstance): string[] => {
  const title = state.mode === 'add' ? 'Add Identity' : 'Edit Identity';
  return [
    style.bold.magenta(title),
    '',
    renderField('Name:', state.form.name, state.form.focus === 'name', style),
    renderField('Email:', state.form.email, state.form.focus === 'email', style),
    ''
  ];
};

const legendFor = (state: SessionState): string => {
  if (state.mode !== 'browse') return FORM_LEGEND;
  return state.filtering ? FILTER_LEGEND : BROWSE_LEGEND;
};

/** Renders the whole screen for `state`. Reads nothing else. */
export const renderSession = (state: SessionState, style: ChalkInstance = chalk): string => {
  const body =
    state.mode === 'browse'
      ? [renderFilterLine(state, style), ...renderList(state, style)]
      : renderForm(state, style);

  return [renderHeader(state, style), '', ...body, style.dim(legendFor(state))].join('\n');
};
