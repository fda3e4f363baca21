export interface Demo {
  name: string;
  code: string;
  description: string;
}

export const DEMOS: readonly Demo[] = [
  {
    name: "Output Character 'A'",
    code: '+'.repeat(65) + '.',
    description: "Builds ASCII value 65 and outputs 'A'",
  },
  {
    name: 'Output Number 42',
    code: '+'.repeat(42) + '#',
    description: 'Builds value 42 and outputs it as a number',
  },
  {
    name: 'Count Down from 5',
    code: '+++++[#-]',
    description: 'Loops 5 times, printing and decrementing',
  },
  {
    name: 'Simple Stack Test',
    code: '+++*++*/#/#',
    description: 'Pushes 3 and 5, then pops and prints both',
  },
  {
    name: 'Hello (short)',
    code: '+'.repeat(72) + '.' + '+'.repeat(29) + '.' + '+'.repeat(7) + '..' + '+++.',
    description: "Prints 'Hello' using ASCII values",
  },
];
