export const EXAMPLES_TEXT = `FLUX EXAMPLE PROGRAMS

Print a number
  ++++++++++++++++++++++++++++++++++++++++++#
  Forty-two increments, then # prints 42.

Count down
  +++++[#-]
  Sets the accumulator to 5. The loop prints it and decrements until it
  reaches 0. Output: 54321

Stack order
  +++*++*/#/#
  Pushes 3, raises the accumulator to 5 and pushes it. The first / restores
  5, the second restores 3. Output: 53

Echo input
  ,[.,]
  Reads a byte; while it is not 0 (end of input), writes it and reads the
  next one.

Uppercase one letter
  ,--------------------------------.
  Reads a lowercase letter and subtracts 32. Input a gives A.

Print a byte value
  ,#
  Reads one byte and prints its code: input A gives 65.

Skip a loop
  [this text never runs]#
  The accumulator is 0 at [, so execution continues after ]. Output: 0
`;
