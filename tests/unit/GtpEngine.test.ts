import { PassThrough } from 'stream';
import { GtpEngine } from '../../src/server/gtp/GtpEngine';
import { runGtpSession } from '../../src/server/index';

function createEngine(boardSize: number = 3): GtpEngine {
  return new GtpEngine({ name: 'goban-rules', version: '0.3.0', boardSize, rng: () => 0 });
}

function send(engine: GtpEngine, line: string): string {
  return engine.handleLine(line).output;
}

describe('GtpEngine', () => {
  describe('administrative commands', () => {
    it('answers identity commands', () => {
      const engine = createEngine();
      expect(send(engine, 'protocol_version')).toBe('= 2\n\n');
      expect(send(engine, 'name')).toBe('= goban-rules\n\n');
      expect(send(engine, 'version')).toBe('= 0.3.0\n\n');
    });

    it('echoes the command id', () => {
      const engine = createEngine();
      expect(send(engine, '1 clear_board')).toBe('=1 \n\n');
      expect(send(engine, '42 name')).toBe('=42 goban-rules\n\n');
    });

    it('lists and recognises its commands', () => {
      const engine = createEngine();
      const listed = send(engine, 'list_commands');
      expect(listed.startsWith('= protocol_version\nname\nversion\n')).toBe(true);
      expect(listed.endsWith('showboard\ncg_list_groups\n\n')).toBe(true);
      expect(send(engine, 'known_command play')).toBe('= true\n\n');
      expect(send(engine, 'known_command frobnicate')).toBe('= false\n\n');
    });

    it('rejects unknown commands', () => {
      const engine = createEngine();
      expect(send(engine, 'frobnicate')).toBe('? unknown command\n\n');
      expect(send(engine, '7')).toBe('?7 unknown command\n\n');
    });

    it('ignores blank lines and comments', () => {
      const engine = createEngine();
      expect(engine.handleLine('   # nothing here')).toEqual({ output: '', quit: false });
    });

    it('flags quit', () => {
      const engine = createEngine();
      expect(engine.handleLine('quit')).toEqual({ output: '= \n\n', quit: true });
    });
  });

  describe('board setup', () => {
    it('resizes the board', () => {
      const engine = createEngine();
      expect(send(engine, 'boardsize 9')).toBe('= \n\n');
      expect(engine.getBoard().getSize()).toBe(9);
    });

    it('refuses sizes it cannot hold', () => {
      const engine = createEngine();
      expect(send(engine, 'boardsize 26')).toBe('? unacceptable size\n\n');
      expect(send(engine, 'boardsize 0')).toBe('? unacceptable size\n\n');
      expect(engine.getBoard().getSize()).toBe(3);
    });

    it('requires an integer size', () => {
      const engine = createEngine();
      expect(send(engine, 'boardsize nine')).toBe('? syntax error\n\n');
      expect(send(engine, 'boardsize')).toBe('? syntax error\n\n');
    });

    it('clears the board', () => {
      const engine = createEngine();
      send(engine, 'play b B2');
      expect(send(engine, 'clear_board')).toBe('= \n\n');
      expect(engine.getBoard().getHistoryLength()).toBe(0);
      expect(engine.getBoard().getIntersection(2, 2)).toEqual({ kind: 'empty' });
    });

    it('stores komi', () => {
      const engine = createEngine();
      expect(send(engine, 'komi 6.5')).toBe('= \n\n');
      expect(engine.getKomi()).toBe(6.5);
      expect(send(engine, 'komi lots')).toBe('? syntax error\n\n');
      expect(engine.getKomi()).toBe(6.5);
    });
  });

  describe('play', () => {
    it('places stones and rejects illegal moves', () => {
      const engine = createEngine();
      expect(send(engine, 'play b A1')).toBe('= \n\n');
      expect(send(engine, 'play w a1')).toBe('? illegal move\n\n');
      expect(engine.getBoard().getIntersection(1, 1)).toEqual({ kind: 'stone', colour: 'black', groupId: 0 });
    });

    it('reports malformed arguments', () => {
      const engine = createEngine();
      expect(send(engine, 'play red A1')).toBe('? invalid color\n\n');
      expect(send(engine, 'play b I1')).toBe('? invalid vertex\n\n');
      expect(send(engine, 'play b D1')).toBe('? invalid vertex\n\n');
      expect(send(engine, 'play b')).toBe('? syntax error\n\n');
    });

    it('records passes and ignores resign', () => {
      const engine = createEngine();
      expect(send(engine, 'play w pass')).toBe('= \n\n');
      expect(engine.getBoard().getLastMove()).toEqual({ type: 'pass' });
      expect(send(engine, 'play b resign')).toBe('= \n\n');
      expect(engine.getBoard().getHistoryLength()).toBe(1);
    });
  });

  describe('genmove and undo', () => {
    it('generates and plays a move', () => {
      const engine = createEngine();
      expect(send(engine, 'genmove black')).toBe('= A1\n\n');
      expect(engine.getBoard().getIntersection(1, 1)).toEqual({ kind: 'stone', colour: 'black', groupId: 0 });
    });

    it('passes when nothing is legal', () => {
      const engine = createEngine(1);
      expect(send(engine, 'genmove w')).toBe('= pass\n\n');
    });

    it('undoes the last move', () => {
      const engine = createEngine();
      send(engine, 'play b A1');
      expect(send(engine, 'undo')).toBe('= \n\n');
      expect(engine.getBoard().getIntersection(1, 1)).toEqual({ kind: 'empty' });
      expect(send(engine, 'undo')).toBe('? cannot undo\n\n');
    });
  });

  describe('diagnostics', () => {
    it('draws the board with the highest row on top', () => {
      const engine = createEngine();
      send(engine, 'play b A1');
      send(engine, 'play w C3');
      expect(send(engine, 'showboard')).toBe(
        '= \n' +
          '   A B C\n' +
          ' 3 . . O 3\n' +
          ' 2 . . . 2\n' +
          ' 1 X . . 1\n' +
          '   A B C\n' +
          'Dead black stones: 0\n' +
          'Dead white stones: 0\n\n'
      );
    });

    it('shows captures and the ko point', () => {
      const engine = createEngine(4);
      for (const line of [
        'play b A2',
        'play w D2',
        'play b B1',
        'play w C1',
        'play b B3',
        'play w C3',
        'play w B2',
        'play b C2',
      ]) {
        expect(send(engine, line)).toBe('= \n\n');
      }
      expect(send(engine, 'showboard').endsWith('Dead black stones: 0\nDead white stones: 1\nKo: B2\n\n')).toBe(
        true
      );
    });

    it('lists groups with their stones and liberties', () => {
      const engine = createEngine();
      send(engine, 'play b A1');
      send(engine, 'play w C3');
      expect(send(engine, 'cg_list_groups')).toBe(
        '= Groups:\n' +
          '0 black :: stones : A1 liberties : B1 A2\n' +
          '1 white :: stones : C3 liberties : B3 C2\n\n'
      );
    });
  });
});

describe('runGtpSession', () => {
  function collect(stream: PassThrough): string {
    const chunks: string[] = [];
    let chunk: unknown = stream.read();
    while (chunk !== null) {
      chunks.push(String(chunk));
      chunk = stream.read();
    }
    return chunks.join('');
  }

  it('answers each line and stops at quit', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    output.setEncoding('utf8');
    const session = runGtpSession(input, output, createEngine());

    input.end('protocol_version\n\n1 play b B2\nquit\n');
    await session;

    expect(collect(output)).toBe('= 2\n\n=1 \n\n= \n\n');
  });

  it('resolves when the input ends without quit', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    output.setEncoding('utf8');
    const engine = createEngine();
    const session = runGtpSession(input, output, engine);

    input.end('play b A1\n');
    await session;

    expect(collect(output)).toBe('= \n\n');
    expect(engine.getBoard().getHistoryLength()).toBe(1);
  });
});
