import { applyQuery, createIdentityIndex, setSource, viewItems, type FilterIndex } from './fuzzy-filter';
import { formatIdentity, hasEmailShape, identityKey, normalizeIdentity } from './identity';
import type { ConfiguredAuthors, Identity, Scope, StoredIdentity } from './types';

// --- Input ---

export type NamedKey = 'enter' | 'escape' | 'up' | 'down' | 'pageUp' | 'pageDown' | 'erase' | 'tab' | 'interrupt';

export type KeyInput = { kind: 'char'; text: string } | { kind: NamedKey };

// --- State ---

export type FormFocus = 'name' | 'email';

export type FormBuffers = {
  name: string;
  email: string;
  focus: FormFocus;
};

export type Viewport = {
  rows: number;
  columns: number;
};

type SessionBase = {
  /** Holds allIdentities (`source`), the filter query and visibleIdentities (`view`). */
  filter: FilterIndex<StoredIdentity>;
  /** Typed characters go to the filter query. */
  filtering: boolean;
  /** Index into the filter view; undefined iff the view is empty. */
  selection: number | undefined;
  status: string;
  error: string | undefined;
  authors: ConfiguredAuthors;
  viewport: Viewport;
};

export type BrowseState = SessionBase & { mode: 'browse' };
export type AddFormState = SessionBase & { mode: 'add'; form: FormBuffers };
export type EditFormState = SessionBase & { mode: 'edit'; form: FormBuffers; targetId: number };
export type FormState = AddFormState | EditFormState;
export type SessionState = BrowseState | FormState;

// --- Effects and events ---

export type SessionEffect =
  | { type: 'delete'; id: number }
  | { type: 'save'; identity: Identity; replaceId?: number }
  | { type: 'apply'; scope: Scope; identity: StoredIdentity }
  | { type: 'quit' };

export type SessionEvent =
  | { type: 'key'; key: KeyInput }
  | { type: 'resize'; viewport: Viewport }
  | { type: 'deleted'; identities: StoredIdentity[] }
  | { type: 'saved'; identities: StoredIdentity[]; identity: Identity }
  | { type: 'applied'; scope: Scope; identity: Identity }
  | { type: 'failed'; message: string; identities?: StoredIdentity[] };

export type Transition = {
  state: SessionState;
  effects: SessionEffect[];
};

// --- Constants ---

export const WELCOME_STATUS = '↑/↓ select, g=global, l=local, a=add, ?=help';
export const HELP_STATUS =
  'keys: ↑/↓ move • enter/l set local • g set global • a add • e edit • del delete • / filter • esc clear • q quit';
export const FILTER_STATUS = 'type to filter, enter to apply, esc to clear';
export const ADD_STATUS = 'add identity: enter for next field / save, esc to cancel';
export const EDIT_STATUS = 'edit identity: enter for next field / save, esc to cancel';

export const DEFAULT_VIEWPORT: Viewport = { rows: 24, columns: 80 };

/** Rows of the browse screen that are not list rows. */
export const LIST_CHROME_ROWS = 6;

export const listHeight = (viewport: Viewport): number => {
  return Math.max(1, viewport.rows - LIST_CHROME_ROWS);
};

// --- Selectors ---

export const allIdentities = (state: SessionState): readonly StoredIdentity[] => state.filter.source;

export const visibleIdentities = (state: SessionState): StoredIdentity[] => viewItems(state.filter);

export const selectedIdentity = (state: SessionState): StoredIdentity | undefined => {
  return state.selection === undefined ? undefined : state.filter.view[state.selection]?.item;
};

// --- Construction ---

export type CreateSessionOptions = {
  authors?: ConfiguredAuthors;
  viewport?: Viewport;
};

export const createSession = (identities: StoredIdentity[], options: CreateSessionOptions = {}): BrowseState => {
  const filter = createIdentityIndex(identities);
  return {
    mode: 'browse',
    filter,
    filtering: false,
    selection: filter.view.length > 0 ? 0 : undefined,
    status: WELCOME_STATUS,
    error: undefined,
    authors: options.authors ?? {},
    viewport: options.viewport ?? DEFAULT_VIEWPORT
  };
};

// --- Helpers ---

const clampSelection = (count: number, selection: number | undefined): number | undefined => {
  if (count === 0) return undefined;
  if (selection === undefined) return 0;
  return Math.min(Math.max(selection, 0), count - 1);
};

const indexOfIdentity = (filter: FilterIndex<StoredIdentity>, match: (item: StoredIdentity) => boolean): number => {
  return filter.view.findIndex((hit) => match(hit.item));
};

const withSnapshot = <S extends SessionState>(state: S, identities: StoredIdentity[], focus?: Identity): S => {
  const filter = setSource(state.filter, identities);
  const focusIndex = focus ? indexOfIdentity(filter, (item) => identityKey(item) === identityKey(focus)) : -1;
  const selection = focusIndex >= 0 ? focusIndex : clampSelection(filter.view.length, state.selection);
  return { ...state, filter, selection };
};

const withQuery = (state: BrowseState, query: string): BrowseState => {
  const filter = applyQuery(state.filter, query);
  return { ...state, filter, selection: filter.view.length > 0 ? 0 : undefined };
};

const dropLastChar = (value: string): string => Array.from(value).slice(0, -1).join('');

const printable = (text: string): string => text.replace(/[\u0000-\u001f\u007f]/g, '');

const toBrowse = (state: SessionState, status: string): BrowseState => {
  return {
    mode: 'browse',
    filter: state.filter,
    filtering: state.filtering,
    selection: state.selection,
    status,
    error: undefined,
    authors: state.authors,
    viewport: state.viewport
  };
};

const done = (state: SessionState, ...effects: SessionEffect[]): Transition => ({ state, effects });

/** A handled input starts a new action: the previous error goes away. */
const begin = <S extends SessionState>(state: S): S => ({ ...state, error: undefined });

export const validateForm = (form: FormBuffers): Identity | string => {
  const identity = normalizeIdentity(form);
  if (identity.name.length === 0) return 'name is required';
  if (identity.email.length === 0) return 'email is required';
  if (!hasEmailShape(identity.email)) return 'email must contain @';
  return identity;
};

// --- Browse ---

const moveSelection = (state: BrowseState, delta: number): Transition | undefined => {
  if (state.selection === undefined) return undefined;
  const selection = clampSelection(state.filter.view.length, state.selection + delta);
  return done({ ...begin(state), selection });
};

const pageSize = (state: SessionState): number => listHeight(state.viewport);

const clearFilter = (state: BrowseState): Transition => {
  const selected = selectedIdentity(state);
  const cleared = withQuery({ ...begin(state), filtering: false }, '');
  const keep = selected ? indexOfIdentity(cleared.filter, (item) => item.id === selected.id) : -1;
  return done({ ...cleared, selection: keep >= 0 ? keep : cleared.selection, status: 'filter cleared' });
};

const startAdd = (state: BrowseState): Transition => {
  const next: AddFormState = {
    ...begin(state),
    mode: 'add',
    form: { name: '', email: '', focus: 'name' },
    status: ADD_STATUS
  };
  return done(next);
};

const startEdit = (state: BrowseState): Transition | undefined => {
  const target = selectedIdentity(state);
  if (!target) return undefined;
  const next: EditFormState = {
    ...begin(state),
    mode: 'edit',
    form: { name: target.name, email: target.email, focus: 'name' },
    targetId: target.id,
    status: EDIT_STATUS
  };
  return done(next);
};

const deleteSelected = (state: BrowseState): Transition | undefined => {
  const target = selectedIdentity(state);
  if (!target) return undefined;
  return done(begin(state), { type: 'delete', id: target.id });
};

const applySelected = (state: BrowseState, scope: Scope): Transition | undefined => {
  const target = selectedIdentity(state);
  if (!target) return undefined;
  return done(begin(state), { type: 'apply', scope, identity: target });
};

const handleBrowseCommand = (state: BrowseState, command: string): Transition | undefined => {
  switch (command) {
    case '/':
      return done({ ...withQuery(begin(state), ''), filtering: true, status: FILTER_STATUS });
    case 'a':
      return startAdd(state);
    case 'e':
      return startEdit(state);
    case 'g':
      return applySelected(state, 'global');
    case 'l':
      return applySelected(state, 'local');
    case 'j':
      return moveSelection(state, 1);
    case 'k':
      return moveSelection(state, -1);
    case '?':
      return done({ ...begin(state), status: HELP_STATUS });
    case 'q':
      return done(state, { type: 'quit' });
    default:
      return undefined;
  }
};

const handleFilterKey = (state: BrowseState, key: KeyInput): Transition | undefined => {
  switch (key.kind) {
    case 'char': {
      const text = printable(key.text);
      return text.length > 0 ? done(withQuery(begin(state), state.filter.query + text)) : undefined;
    }
    case 'erase':
      return done(withQuery(begin(state), dropLastChar(state.filter.query)));
    case 'enter':
      return done({ ...begin(state), filtering: false, status: 'filter applied' });
    case 'escape':
      return clearFilter(state);
    case 'up':
      return moveSelection(state, -1);
    case 'down':
      return moveSelection(state, 1);
    case 'pageUp':
      return moveSelection(state, -pageSize(state));
    case 'pageDown':
      return moveSelection(state, pageSize(state));
    default:
      return undefined;
  }
};

const handleBrowseKey = (state: BrowseState, key: KeyInput): Transition | undefined => {
  if (key.kind === 'interrupt') {
    return done(state, { type: 'quit' });
  }

  if (state.filtering) {
    return handleFilterKey(state, key);
  }

  switch (key.kind) {
    case 'char':
      return handleBrowseCommand(state, key.text);
    case 'up':
      return moveSelection(state, -1);
    case 'down':
      return moveSelection(state, 1);
    case 'pageUp':
      return moveSelection(state, -pageSize(state));
    case 'pageDown':
      return moveSelection(state, pageSize(state));
    case 'enter':
      return applySelected(state, 'local');
    case 'erase':
      return deleteSelected(state);
    case 'escape':
      return state.filter.query.length > 0 ? clearFilter(state) : undefined;
    default:
      return undefined;
  }
};

// --- Forms ---

const withForm = (state: FormState, form: FormBuffers): FormState => {
  return { ...begin(state), form };
};

const editFocused = (form: FormBuffers, edit: (value: string) => string): FormBuffers => {
  return form.focus === 'name' ? { ...form, name: edit(form.name) } : { ...form, email: edit(form.email) };
};

const submitForm = (state: FormState): Transition => {
  const result = validateForm(state.form);
  if (typeof result === 'string') {
    return done({ ...state, error: result });
  }

  const effect: SessionEffect =
    state.mode === 'edit'
      ? { type: 'save', identity: result, replaceId: state.targetId }
      : { type: 'save', identity: result };
  return done(begin(state), effect);
};

const handleFormKey = (state: FormState, key: KeyInput): Transition | undefined => {
  const { form } = state;
  switch (key.kind) {
    case 'interrupt':
      return done(state, { type: 'quit' });
    case 'escape':
      return done(toBrowse(state, 'cancelled'));
    case 'char': {
      const text = printable(key.text);
      if (text.length === 0) return undefined;
      return done(withForm(state, editFocused(form, (value) => value + text)));
    }
    case 'erase':
      return done(withForm(state, editFocused(form, dropLastChar)));
    case 'tab':
      return form.focus === 'name' ? done(withForm(state, { ...form, focus: 'email' })) : undefined;
    case 'enter':
      return form.focus === 'name' ? done(withForm(state, { ...form, focus: 'email' })) : submitForm(state);
    default:
      return undefined;
  }
};

// --- Effect outcomes ---

const handleOutcome = (state: SessionState, event: Exclude<SessionEvent, { type: 'key' | 'resize' }>): Transition => {
  switch (event.type) {
    case 'deleted':
      return done({ ...withSnapshot(state, event.identities), status: 'deleted' });
    case 'saved':
      return done(withSnapshot(toBrowse(state, 'saved'), event.identities, event.identity));
    case 'applied':
      return done({
        ...state,
        authors: { ...state.authors, [event.scope]: event.identity },
        status: `set ${event.scope}: ${formatIdentity(event.identity)}`
      });
    case 'failed': {
      const next = event.identities ? withSnapshot(state, event.identities) : state;
      return done({ ...next, error: event.message });
    }
  }
};

/**
 * Pure transition function. Inputs that have no meaning in the current mode
 * return the state unchanged and no effects.
 */
export const update = (state: SessionState, event: SessionEvent): Transition => {
  switch (event.type) {
    case 'key': {
      const handled = state.mode === 'browse' ? handleBrowseKey(state, event.key) : handleFormKey(state, event.key);
      return handled ?? done(state);
    }
    case 'resize':
      return done({ ...state, viewport: event.viewport });
    default:
      return handleOutcome(state, event);
  }
};
