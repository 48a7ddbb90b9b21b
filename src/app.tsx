import { useEffect } from 'react';
import { Text, useInput, useStdout } from 'ink';
import { useStore } from 'zustand';
import { toKeyInput } from './keys';
import { DEFAULT_VIEWPORT } from './session';
import type { SessionRunner } from './session-runner';
import { renderSession } from './view';

type AppProps = {
  session: SessionRunner;
};

export const App = ({ session }: AppProps) => {
  const state = useStore(session.store);
  const { stdout } = useStdout();

  useEffect(() => {
    const onResize = (): void => {
      void session.dispatch({
        type: 'resize',
        viewport: {
          rows: stdout.rows || DEFAULT_VIEWPORT.rows,
          columns: stdout.columns || DEFAULT_VIEWPORT.columns
        }
      });
    };

    onResize();
    stdout.on('resize', onResize);
    return () => {
      stdout.off('resize', onResize);
    };
  }, [session, stdout]);

  useInput((input, key) => {
    const keyInput = toKeyInput(input, key);
    if (keyInput) {
      void session.dispatch({ type: 'key', key: keyInput });
    }
  });

  return <Text>{renderSession(state)}</Text>;
};
