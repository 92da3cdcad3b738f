import { describe, test, expect, vi, afterEach } from 'vitest';
import { render, screen, fireEvent } from '@testing-library/react';
import App from '@/App';
import { DocumentProvider } from '@/state/DocumentContext';
import { createTestDocument } from '../utils/testDocument';

function renderApp() {
  const doc = createTestDocument();
  render(
    <DocumentProvider store={doc.store}>
      <App />
    </DocumentProvider>
  );
  return doc;
}

const outputCell = (key: string) => document.querySelector(`[data-output="${key}"]`);

afterEach(() => {
  vi.restoreAllMocks();
});

describe('App', () => {
  test('renders one input per scalar and per bound block', () => {
    renderApp();
    expect(screen.getByLabelText('Gravity Multiplier')).toHaveValue('1.00');
    expect(screen.getByLabelText('Crate A')).toHaveValue('');
    expect(screen.getByLabelText('Jet up')).toBeInTheDocument();
    expect(screen.getByLabelText('Jet right')).toBeInTheDocument();
    expect(screen.queryByLabelText('Bench')).toBeNull();
  });

  test('typing a count updates the outputs', () => {
    const { store } = renderApp();
    fireEvent.change(screen.getByLabelText('Crate A'), { target: { value: '3' } });

    expect(store.getState().model.counts.storage).toEqual({ 'crate.a': 3 });
    expect(screen.getByLabelText('Crate A')).toHaveValue('3');
    expect(outputCell('mass.empty')).toHaveTextContent('30.00');
    expect(outputCell('volume.any')).toHaveTextContent('300.00');
  });

  test('shows infinite durations', () => {
    renderApp();
    expect(outputCell('power.tiers.idle.duration')).toHaveTextContent('∞');
  });

  test('Ctrl+S saves through the chooser and shows the file', () => {
    const { files, chooser } = renderApp();
    chooser.answer('grids/ship.json');

    fireEvent.keyDown(window, { key: 's', ctrlKey: true });

    expect(files.files.has('grids/ship.json')).toBe(true);
    expect(screen.getByTestId('current-file')).toHaveTextContent('grids/ship.json');
  });

  test('a failed open shows a toast', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { chooser } = renderApp();
    chooser.answer('missing.json');

    fireEvent.keyDown(window, { key: 'o', ctrlKey: true });

    expect(screen.getByTestId('toast')).toHaveTextContent(
      "Could not open file 'missing.json' for reading: ENOENT: no such file 'missing.json'"
    );
  });

  test('Open button with a cancelled chooser changes nothing', () => {
    const { chooser, store } = renderApp();
    chooser.answer(null);
    const before = store.getState();
    fireEvent.click(screen.getByRole('button', { name: 'Open' }));
    expect(store.getState()).toBe(before);
    expect(screen.queryByTestId('toast')).toBeNull();
  });
});
