// AppleScript sources for the Keynote operations
// Failures are raised with `error` so osascript exits non-zero

import { appleScriptString } from './applescript.js';

const REQUIRE_DOCUMENT = `if not (exists document 1) then error "No Keynote document is open."`;

// Blank layout when the theme has one, the default layout otherwise
const MAKE_BLANK_SLIDE = `try
        set targetSlide to make new slide with properties {base layout:slide layout "Blank"}
      on error
        set targetSlide to make new slide
      end try
      set current slide to targetSlide`;

export function blankSlideScript(): string {
  return `
tell application "Keynote"
  activate
  if not (exists document 1) then
    try
      make new document with properties {document theme:theme "White"}
    on error
      make new document
    end try
    delay 1
  end if
  tell front document
    if (count of slides) = 0 then
      ${MAKE_BLANK_SLIDE}
    else if (count of iWork items of current slide) > 0 then
      ${MAKE_BLANK_SLIDE}
    end if
  end tell
  return "Blank slide ready in the front document."
end tell`;
}

export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function rectangleScript(box: Box): string {
  return `
tell application "Keynote"
  ${REQUIRE_DOCUMENT}
  tell current slide of front document
    make new shape with properties {position:{${box.x}, ${box.y}}, width:${box.width}, height:${box.height}}
  end tell
  return "Rectangle drawn"
end tell`;
}

export function textBoxScript(text: string, box: Box): string {
  return `
tell application "Keynote"
  ${REQUIRE_DOCUMENT}
  tell current slide of front document
    make new text item with properties {position:{${box.x}, ${box.y}}, width:${box.width}, height:${box.height}, object text:${appleScriptString(text)}}
  end tell
  return "Text added"
end tell`;
}
