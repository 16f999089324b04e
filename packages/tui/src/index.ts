/**
 * @file 包入口文件
 *
 * 终端控制协议核心的公共 API：
 * - 终端能力检测和缓存
 * - 平台适配
 * - 后端选择（raw / tty）
 * - ANSI 编码
 * - 输入转义序列解码
 * - 终端会话、配置和日志
 */

// ANSI 编码
export {
	attribute,
	attributeOff,
	background,
	background256,
	backgroundRgb,
	type CharacterSet,
	type Color,
	type Command,
	clearLine,
	clearLineFromCursor,
	clearLineToCursor,
	clearScreen,
	clearScreenFromCursor,
	clearScreenToCursor,
	colorParams,
	createEncoder,
	cursorBack,
	cursorDown,
	cursorForward,
	cursorHide,
	cursorShow,
	cursorTo,
	cursorUp,
	disableMode,
	type EncodeOptions,
	type Encoder,
	enableMode,
	encode,
	foreground,
	foreground256,
	foregroundRgb,
	type NamedColor,
	type RgbColor,
	requestWindowSize,
	reset,
	restoreCursor,
	type Style,
	saveCursor,
	scrollDown,
	scrollUp,
	setScrollRegion,
	setTitle,
	sgr,
	type TerminalMode,
	type TextAttribute,
} from "./ansi.js";
// 后端选择
export {
	type AutoSelection,
	type BackendSelection,
	BackendSelector,
	type BackendSelectorOptions,
	createProcessRawModeDriver,
	type ExplicitBackend,
	type ExplicitSelection,
	type RawModeDriver,
	type RawModeOutcome,
	type RawState,
	releaseBackend,
	selectBackend,
	type TtyCapabilities,
} from "./backend.js";
// 终端能力
export {
	type Capabilities,
	CapabilityCache,
	type ColorMode,
	clearCapabilitiesCache,
	colorModeRank,
	DEFAULT_CAPABILITIES,
	type DetectOptions,
	detectCapabilities,
	getCapabilities,
	parseTerminfoColors,
	queryInfocmp,
	supports256Color,
	supportsTrueColor,
	type TerminfoQuery,
	upgradeColorMode,
} from "./capabilities.js";
// 颜色和字符降级
export {
	ANSI_COLOR_NAMES,
	type AnsiColorName,
	color256To16,
	glyphToAscii,
	rgbTo16,
	rgbTo256,
	toAscii,
} from "./color-fallbacks.js";
// 配置
export {
	type BackendChoice,
	ConfigSchema,
	DEFAULT_CONFIG,
	effectiveCharacterSet,
	getConfig,
	getConfigDir,
	getConfigPath,
	type LoadConfigOptions,
	loadConfig,
	type MouseTracking,
	type RawOptions,
	reloadConfig,
	type TermwireConfig,
	type TtyOptions,
} from "./config.js";
// 输入解码
export { type DecodeResult, type DecoderMode, decodeInput, InputDecoder } from "./decoder.js";
export {
	type FocusEvent,
	type InputEvent,
	type KeyEvent,
	keyEvent,
	matchesKey,
	type Modifier,
	type MouseAction,
	type MouseButton,
	type MouseEvent,
	type NamedKey,
	normalizeModifiers,
	type PasteEvent,
	type ResizeEvent,
} from "./events.js";
// 日志
export { createLogger, type Logger, type LoggerOptions, type LogLevel } from "./log.js";
// 平台适配
export {
	type ConsoleApi,
	createPlatformAdapter,
	DEFAULT_TERMINAL_SIZE,
	getPlatform,
	isValidDimension,
	MAX_TERMINAL_DIMENSION,
	type OsVersion,
	type PlatformAdapter,
	type PlatformAdapterOptions,
	type PlatformFamily,
	type PlatformFeature,
	type PlatformInfo,
	parseSttySize,
	type SessionHints,
	type TerminalSize,
	type VtSupport,
	WINDOWS_MINIMUM_VERSION,
	type WindowsSupport,
} from "./platform.js";
// 终端会话
export {
	mouseTrackingModes,
	ProcessTerminal,
	type ProcessTerminalOptions,
	type Terminal,
	type TerminalInput,
	type TerminalOutput,
} from "./terminal.js";
