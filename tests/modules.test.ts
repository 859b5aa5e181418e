import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Engine, nullInput } from '../src/runtime/engine';
import { ModuleLoader, expandSearchPath, moduleName } from '../src/runtime/module-loader';
import { STRATEGIES, plain } from './helpers';

const TEST_DIR = path.join(__dirname, '__modules_test_tmp__');

const MODULES: Record<string, string> = {
  'math.marq': 'def double(x): mul(x, 2);\nlet base = 10\n',
  'strings.marq': 'include "math"\n| def shout(s): upcase(s);\n',
  'bad.marq': '1 + 2\n',
  'broken.marq': 'def f(: 1\n',
  'cycle_a.marq': 'import "cycle_b"\n',
  'cycle_b.marq': 'import "cycle_a"\n',
};

beforeAll(() => {
  fs.mkdirSync(TEST_DIR, { recursive: true });
  for (const [file, source] of Object.entries(MODULES)) {
    fs.writeFileSync(path.join(TEST_DIR, file), source);
  }
});

afterAll(() => {
  if (fs.existsSync(TEST_DIR)) {
    fs.rmSync(TEST_DIR, { recursive: true });
  }
});

describe('ModuleLoader', () => {
  it('should resolve modules over the search paths', () => {
    const loader = new ModuleLoader(['/nonexistent', TEST_DIR]);
    expect(loader.resolve('math')).toBe(path.join(TEST_DIR, 'math.marq'));
  });

  it('should report modules that cannot be found', () => {
    const loader = new ModuleLoader([TEST_DIR]);
    expect(() => loader.resolve('nope')).toThrow(`ModuleLoadError: Module "nope" not found in search paths: ${TEST_DIR}`);
  });

  it('should split a module into its definitions and cache it', () => {
    const loader = new ModuleLoader([TEST_DIR]);
    const module = loader.load('math');
    expect(module.name).toBe('math');
    expect(module.functions.map(def => def.name)).toEqual(['double']);
    expect(module.vars.map(binding => binding.name)).toEqual(['base']);
    expect(loader.load('math')).toBe(module);
  });

  it('should reject modules with statements other than definitions', () => {
    const loader = new ModuleLoader([TEST_DIR]);
    expect(() => loader.load('bad')).toThrow('ModuleLoadError: Invalid module "bad": unexpected Call at line 1');
  });

  it('should report syntax errors in modules', () => {
    const loader = new ModuleLoader([TEST_DIR]);
    expect(() => loader.load('broken')).toThrow('ModuleLoadError: Syntax error in module "broken"');
  });

  it('should name modules after their file', () => {
    expect(moduleName('lib/util.marq')).toBe('util');
    expect(moduleName('util')).toBe('util');
  });

  it('should expand $HOME in search paths', () => {
    expect(expandSearchPath('$HOME/.marq')).toBe(`${os.homedir()}/.marq`);
  });
});

describe.each(STRATEGIES)('Modules (%s)', (_label, useCompiler) => {
  let engine: Engine;

  beforeEach(() => {
    engine = new Engine({ useCompiler, searchPaths: [TEST_DIR] });
  });

  function run(code: string): unknown[] {
    return engine.eval(code, nullInput()).map(plain);
  }

  it('should include definitions into the current scope', () => {
    expect(run('include "math" | double(base)')).toEqual([20]);
  });

  it('should include dependencies of included modules', () => {
    expect(run('include "strings" | shout("hi")')).toEqual(['HI']);
  });

  it('should reach imported members by qualified name', () => {
    expect(run('import "math" | math::double(3)')).toEqual([6]);
    expect(run('import "math" | math::base')).toEqual([10]);
  });

  it('should report missing members', () => {
    expect(() => run('import "math" | math::nope')).toThrow('NotDefined: "math::nope" is not defined');
  });

  it('should detect circular imports', () => {
    expect(() => run('import "cycle_a"')).toThrow('ModuleLoadError: Circular import detected: cycle_a -> cycle_b -> cycle_a');
  });

  it('should define inline modules', () => {
    expect(run('module m: def f(): 1; end | m::f()')).toEqual([1]);
  });

  it('should load modules through the engine', () => {
    engine.loadModule('math');
    expect(run('double(2)')).toEqual([4]);
  });
});
