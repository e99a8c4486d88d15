const MARKET_TIME_ZONE = "America/New_York";
const OPEN_MINUTE = 9 * 60 + 30;
const CLOSE_MINUTE = 16 * 60;

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];

const formatter = new Intl.DateTimeFormat("en-US", {
  timeZone: MARKET_TIME_ZONE,
  weekday: "short",
  hour: "2-digit",
  minute: "2-digit",
  hourCycle: "h23"
});

function partsInMarketTime(date: Date) {
  const parts = formatter.formatToParts(date);
  const lookup = (type: Intl.DateTimeFormatPartTypes) => parts.find((part) => part.type === type)?.value ?? "";
  return {
    weekday: WEEKDAYS.indexOf(lookup("weekday")),
    hour: Number.parseInt(lookup("hour"), 10),
    minute: Number.parseInt(lookup("minute"), 10)
  };
}

// Regular NYSE/Nasdaq session only; exchange holidays are not considered.
export function isMarketOpen(date: Date = new Date()): boolean {
  const { weekday, hour, minute } = partsInMarketTime(date);
  if (weekday < 1 || weekday > 5) {
    return false;
  }
  const minutes = hour * 60 + minute;
  return minutes >= OPEN_MINUTE && minutes < CLOSE_MINUTE;
}
