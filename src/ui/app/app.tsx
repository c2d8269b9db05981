import { useCallback, useEffect, useMemo, useRef, useState } from 'react';
import { Box, Text, useApp, useInput, useStdout } from 'ink';

import type { AgentState, ExecutionEvent, ShellAgent } from '../../agent/shell-agent.js';
import { CommandEditor } from '../components/command-editor.js';
import type {
  ConfirmationBroker,
  ConfirmationRequestEvent,
} from '../providers/confirmation-broker.js';
import { toTerminalInput } from '../terminal-input.js';
import { TerminalTranscript } from '../terminal-transcript.js';

interface AppProps {
  agent: ShellAgent;
  broker: ConfirmationBroker;
}

type PanelMode = 'choose' | 'edit';

// Rows kept for the status bar and the confirmation panel.
const RESERVED_ROWS = 8;

export function App({ agent, broker }: AppProps) {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const columns = stdout?.columns ?? 80;
  const rows = stdout?.rows ?? 24;
  const visibleLines = Math.max(rows - RESERVED_ROWS, 3);

  const transcript = useRef(new TerminalTranscript());
  const [lines, setLines] = useState<string[]>([]);
  const [agentState, setAgentState] = useState<AgentState>(() => agent.getState());
  const [pending, setPending] = useState<ConfirmationRequestEvent[]>(() => broker.listPending());
  const [lastExecution, setLastExecution] = useState<ExecutionEvent | null>(null);
  const [panelMode, setPanelMode] = useState<PanelMode>('choose');
  const [draft, setDraft] = useState('');

  const active = pending[0];

  useEffect(() => {
    const unsubscribeData = agent.onTerminalData((data) => {
      transcript.current.push(data);
      setLines(transcript.current.tail(visibleLines));
    });
    setLines(transcript.current.tail(visibleLines));
    return unsubscribeData;
  }, [agent, visibleLines]);

  useEffect(() => {
    const unsubscribeState = agent.onStateChange(setAgentState);
    const unsubscribeExecution = agent.onExecution(setLastExecution);
    return () => {
      unsubscribeState();
      unsubscribeExecution();
    };
  }, [agent]);

  useEffect(() => {
    const refresh = () => setPending(broker.listPending());
    const unsubscribeRequest = broker.onRequest(refresh);
    const unsubscribeResolved = broker.onResolved(() => {
      refresh();
      setPanelMode('choose');
    });
    return () => {
      unsubscribeRequest();
      unsubscribeResolved();
    };
  }, [broker]);

  useEffect(() => {
    agent.resizeTerminal(columns, visibleLines);
  }, [agent, columns, visibleLines]);

  const quit = useCallback(() => {
    broker.close('Operator closed the confirmation surface.');
    exit();
  }, [broker, exit]);

  useInput((input, key) => {
    if (key.ctrl && input === 'q') {
      quit();
      return;
    }

    if (active) {
      if (panelMode === 'edit') {
        return;
      }

      const choice = input.toLowerCase();
      if (choice === 'y') {
        broker.respond(active.id, { type: 'approve' });
      } else if (choice === 'n') {
        broker.respond(active.id, { type: 'deny', reason: 'Denied by operator.' });
      } else if (choice === 'e') {
        setDraft(active.request.request.command);
        setPanelMode('edit');
      }
      return;
    }

    const data = toTerminalInput(input, key);
    if (data !== undefined) {
      agent.sendOperatorInput(data);
    }
  });

  const handleEditSubmit = useCallback(
    (command: string) => {
      if (!active) {
        return;
      }
      broker.respond(active.id, { type: 'edit', command });
    },
    [active, broker],
  );

  const padding = useMemo(
    () => Array.from({ length: Math.max(visibleLines - lines.length, 0) }, () => ''),
    [lines.length, visibleLines],
  );

  return (
    <Box flexDirection="column">
      <Box flexDirection="column">
        {[...lines, ...padding].map((line, index) => (
          <Text key={index} wrap="truncate-end">
            {line.length > 0 ? line : ' '}
          </Text>
        ))}
      </Box>
      {active ? (
        <ConfirmationPanel
          event={active}
          queued={pending.length - 1}
          mode={panelMode}
          draft={draft}
          width={columns}
          onDraftChange={setDraft}
          onSubmit={handleEditSubmit}
          onCancel={() => setPanelMode('choose')}
        />
      ) : null}
      <StatusBar
        agentState={agentState}
        socketPath={agent.socketPath}
        pendingCount={pending.length}
        lastExecution={lastExecution}
        width={columns}
      />
    </Box>
  );
}

interface ConfirmationPanelProps {
  event: ConfirmationRequestEvent;
  queued: number;
  mode: PanelMode;
  draft: string;
  width: number;
  onDraftChange: (value: string) => void;
  onSubmit: (value: string) => void;
  onCancel: () => void;
}

function ConfirmationPanel({
  event,
  queued,
  mode,
  draft,
  width,
  onDraftChange,
  onSubmit,
  onCancel,
}: ConfirmationPanelProps) {
  const { request, decision } = event.request;

  return (
    <Box borderStyle="round" borderColor="yellow" paddingX={1} width={width} flexDirection="column">
      <Box justifyContent="space-between">
        <Text color="yellow">{`Confirm ${request.mode} command`}</Text>
        {queued > 0 ? <Text color="gray">{`${queued} more waiting`}</Text> : null}
      </Box>
      {mode === 'edit' ? (
        <Box>
          <Text color="cyan">› </Text>
          <CommandEditor
            value={draft}
            onChange={onDraftChange}
            onSubmit={onSubmit}
            onCancel={onCancel}
          />
        </Box>
      ) : (
        <Text color="white">{request.command}</Text>
      )}
      <Text color="gray">{decision.reason}</Text>
      <Text color="gray">
        {mode === 'edit'
          ? 'Enter to run the edited command, Esc to go back'
          : '[y] approve  [n] deny  [e] edit  Ctrl-Q quit'}
      </Text>
    </Box>
  );
}

interface StatusBarProps {
  agentState: AgentState;
  socketPath: string;
  pendingCount: number;
  lastExecution: ExecutionEvent | null;
  width: number;
}

const STATE_COLORS: Record<AgentState, string> = {
  stopped: 'gray',
  starting: 'yellow',
  running: 'green',
  unavailable: 'red',
};

function StatusBar({ agentState, socketPath, pendingCount, lastExecution, width }: StatusBarProps) {
  const last = lastExecution
    ? `last: ${lastExecution.request.id} ${lastExecution.result.status}` +
      (lastExecution.result.exitCode === null ? '' : ` (exit ${lastExecution.result.exitCode})`)
    : 'last: none';

  return (
    <Box width={width} justifyContent="space-between">
      <Text color={STATE_COLORS[agentState]}>{`● ${agentState}`}</Text>
      <Text color="gray">{socketPath}</Text>
      <Text color={pendingCount > 0 ? 'yellow' : 'gray'}>{`pending: ${pendingCount}`}</Text>
      <Text color="gray">{last}</Text>
    </Box>
  );
}
