export const DOCUMENTED_PY = [
  'def load(path):',
  '    """Load the config.',
  '',
  '    ---docfacts',
  '    what: Loads config.',
  '    deps:',
  '      calls:',
  '        - json.loads',
  '    why: Speed.',
  '    guardrails:',
  '      - keep it pure',
  '    ---/docfacts',
  '    """',
  '    return json.loads(path)',
  '',
  '',
  'def bare():',
  '    return 1',
  '',
  '',
  'def summary_only():',
  '    """Just words."""',
  '    return 2',
  '',
  '',
  'def broken():',
  '    """',
  '    ---docfacts',
  '    what: X',
  '    why: Y',
  '    ---/docfacts',
  '    """',
  '    return 3',
  '',
].join('\n');

export const LOAD_RAW = ['what: Loads config.', 'deps:', '  calls:', '    - json.loads', 'why: Speed.', 'guardrails:', '  - keep it pure'].join('\n');
