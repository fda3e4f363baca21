export const GUIDE_TEXT = `FLUX BEGINNER'S GUIDE

1. THE ACCUMULATOR
  A Flux program works on a single number, the accumulator, which starts at 0.
  + adds one, - subtracts one and # prints it:

    +++#          prints 3
    +++--#        prints 1
    -#            prints -1

2. PRINTING CHARACTERS
  . prints the accumulator as a character code. 65 is A, 72 is H:

    (65 plus signs).           prints A

  Values outside 0..255 wrap around, so 321 also prints A and -1 prints the
  byte 255.

3. LOOPS
  [ ... ] repeats its body while the accumulator is not 0. When the
  accumulator is already 0 at [, the body is skipped entirely.

    +++++[#-]     prints 54321
    [+++#]#       prints 0: the loop never runs

  Make sure the body eventually brings the accumulator to 0, or the loop
  never ends. Press Ctrl+C to stop a runaway program.

4. THE STACK
  * saves a copy of the accumulator on the stack, / takes the top value back.

    +++*++*/#/#   prints 53
    /#            prints 0: popping an empty stack gives 0

  Push a value before a loop that counts the accumulator down, and pop it
  afterwards to get it back.

5. INPUT
  , reads one byte of input into the accumulator, 0 at the end of input.

    ,[.,]         copies input to output (a cat program)

  Try it:  echo hello | flux run cat.flux

6. NEXT STEPS
  flux examples   annotated programs
  flux reference  the complete rules
  flux repl       try snippets one line at a time
`;
