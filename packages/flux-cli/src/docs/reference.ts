export const REFERENCE_TEXT = `FLUX LANGUAGE REFERENCE

OVERVIEW
  Flux is a minimal stack-based language with nine operations, one integer
  accumulator and one unbounded integer stack. Source text is compiled in a
  single pass to bytecode with resolved jump targets, then executed.

MACHINE STATE
  accumulator   32-bit signed integer, starts at 0, wraps on overflow
                (2147483647 + 1 = -2147483648)
  stack         last-in first-out list of integers, starts empty, no size limit
  input         a byte stream; end of input reads as 0
  output        a byte stream

OPERATIONS
  +   INC        accumulator = accumulator + 1
  -   DEC        accumulator = accumulator - 1
  *   PUSH       push a copy of the accumulator; the accumulator is unchanged
  /   POP        accumulator = top of stack, removing it;
                 an empty stack yields 0 and is not an error
  [   LOOP_START if accumulator == 0, continue after the matching ]
  ]   LOOP_END   if accumulator != 0, jump back to the matching [
  .   OUT_CHAR   write one byte: accumulator mod 256, always 0..255
                 (-1 writes 255)
  ,   IN_CHAR    read one byte into the accumulator; end of input gives 0
  #   OUT_NUM    write the accumulator in decimal, with a leading - if negative

  The loop condition is tested only at [ on entry and at ] on the way back.

COMMENTS AND WHITESPACE
  Every character other than the nine operators is ignored, so plain words
  can annotate a program. Avoid writing the operator characters in comments:
  "step 1, then 2." contains a , and a . which are operations.

ERRORS
  Compile time
    unmatched ']' at position N           a ] with no open [; N counts from 0
    N unmatched '[' bracket(s) in source  [ left open at the end of the source
  Run time
    input error / output error            the input or output stream failed;
                                          output already written is kept

  Nothing else is an error: popping an empty stack yields 0, the stack grows
  as needed, and a loop whose body never reaches 0 runs forever.

BYTECODE
  flux compile <file> lists one instruction per line:
    0001  LOOP_START  -> 4     skip target: the address after the matching ]
    0003  LOOP_END    -> 1     repeat target: the address of the matching [
  flux compile <file> --json prints the same program as JSON, which
  flux run accepts back when the file name ends in .json.
`;
