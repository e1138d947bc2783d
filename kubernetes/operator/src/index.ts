export * from './delay'
export * from './operator'
export * from './operator.enums'
export * from './operator.interfaces'
export * from './resource.utils'
export * from './timeout'
export * from './watch'
export * from './watch.errors'
