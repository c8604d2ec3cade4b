import { defineStore } from 'pinia'
import { ref } from 'vue'
import type { Toast, ToastType } from '@/types'

// 只保留最近的若干条，避免长时间会话中无限增长
const MAX_TOASTS = 20

export const useToastStore = defineStore('toast', () => {
  const toasts = ref<Toast[]>([])
  const timers = new Map<string, ReturnType<typeof setTimeout>>()
  let seq = 0

  function show(message: string, type: ToastType = 'info', duration: number = 3000) {
    const id = `toast-${Date.now()}-${++seq}`
    const toast: Toast = { id, message, type, duration }
    toasts.value.push(toast)
    while (toasts.value.length > MAX_TOASTS) {
      const first = toasts.value[0]
      if (!first) break
      remove(first.id)
    }

    if (duration > 0) {
      const timer = setTimeout(() => {
        remove(id)
      }, duration)
      // 提示计时不应阻止进程退出
      timer.unref?.()
      timers.set(id, timer)
    }

    return id
  }

  function remove(id: string) {
    const timer = timers.get(id)
    if (timer) {
      clearTimeout(timer)
      timers.delete(id)
    }
    const index = toasts.value.findIndex(t => t.id === id)
    if (index !== -1) {
      toasts.value.splice(index, 1)
    }
  }

  function clear() {
    for (const timer of timers.values()) clearTimeout(timer)
    timers.clear()
    toasts.value = []
  }

  function success(message: string, duration?: number) {
    return show(message, 'success', duration)
  }

  function error(message: string, duration?: number) {
    return show(message, 'error', duration)
  }

  function info(message: string, duration?: number) {
    return show(message, 'info', duration)
  }

  function warning(message: string, duration?: number) {
    return show(message, 'warning', duration)
  }

  return {
    toasts,
    show,
    remove,
    clear,
    success,
    error,
    info,
    warning,
  }
})
