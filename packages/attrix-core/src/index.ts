// Public barrel for @attrix/core
// 推荐使用方式：
//   import * as Attrix from "@attrix/core"
// 此时 Attrix 下会挂载 Field / Lazy / Interceptor / Record / Attribute / Debug / Config / Errors 等命名空间。

// Field：共享的校验字段描述符（weak side-table）
export * as Field from './Field.js'

// Lazy / Interceptor：缺失字段的惰性绑定、全量读拦截与写拦截
export * as Lazy from './Lazy.js'
export * as Interceptor from './Interceptor.js'

// Record：类型声明与属性解析
export * as Record from './Record.js'
export type { Interceptable, RecordType } from './Record.js'

// Attribute：面向通用代码的存在性检查与 Effect 访问入口
export * as Attribute from './Attribute.js'

export * as Debug from './Debug.js'
export * as Config from './Config.js'
export * as Errors from './Errors.js'
export type { RawAccess } from './internal/store.js'
