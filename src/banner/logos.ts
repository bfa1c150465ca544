// Built-in logos, keyed by os.platform().

export const LOGOS: Readonly<Record<string, readonly string[]>> = {
  linux: [
    '    .--.    ',
    '   |o_o |   ',
    '   |:_/ |   ',
    '  //   \\ \\  ',
    ' (|     | ) ',
    "/'\\_   _/`\\ ",
    '\\___)=(___/ ',
  ],
  darwin: [
    '       .:\'   ',
    '    __ :\'__  ',
    " .'`  `-'  ``.",
    ':          .-\'',
    ':         :   ',
    ' :         `-;',
    "  `.__.-.__.' ",
  ],
  win32: [
    ' _______  _______ ',
    '|       ||       |',
    '|       ||       |',
    '|_______||_______|',
    ' _______  _______ ',
    '|       ||       |',
    '|_______||_______|',
  ],
  generic: [
    '  _________  ',
    ' |  _____  | ',
    ' | |>_   | | ',
    ' | |_____| | ',
    ' |_________| ',
    '   _|___|_   ',
    '  |_______|  ',
  ],
};
